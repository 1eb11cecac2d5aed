#!/usr/bin/env node
import { createRequire } from "node:module";
import { createCli } from "./cli/program.js";

const require = createRequire(import.meta.url);
const pkg = require("../../package.json") as { version: string };

const cli = createCli(pkg.version);
void cli.runExit(process.argv.slice(2));
