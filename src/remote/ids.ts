let lastId = 0;

/** Command ids for the remote-control protocol, shared by outer and inner commands. */
export function nextRemoteId(): number {
  lastId += 1;
  return lastId;
}
