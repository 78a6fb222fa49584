#!/usr/bin/env node
import { run } from "./cli.js";

const status = await run(process.argv.slice(2));
if (status !== 0) {
  process.exit(status);
}
