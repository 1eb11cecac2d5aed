export interface Segment {
  readonly type: string;
  readonly data: Readonly<Record<string, unknown>>;
}

export type MessageContent = string | readonly Segment[];

/** Builds a platform message chain segment by segment. */
export class MessageBuilder {
  private readonly segments: Segment[] = [];

  add(type: string, data: Record<string, string>): this {
    this.segments.push({ type, data });
    return this;
  }

  text(text: string): this {
    return this.add("text", { text });
  }

  face(id: number | string): this {
    return this.add("face", { id: String(id) });
  }

  at(userId: number | string): this {
    return this.add("at", { qq: String(userId) });
  }

  atAll(): this {
    return this.at("all");
  }

  reply(messageId: number | string): this {
    return this.add("reply", { id: String(messageId) });
  }

  // file accepts a name, URL, base64:// payload or local path
  image(file: string): this {
    return this.add("image", { file });
  }

  record(file: string): this {
    return this.add("record", { file });
  }

  video(file: string): this {
    return this.add("video", { file });
  }

  file(file: string, name?: string): this {
    return this.add("file", name === undefined ? { file } : { file, name });
  }

  json(payload: string): this {
    return this.add("json", { data: payload });
  }

  build(): Segment[] {
    return [...this.segments];
  }
}
