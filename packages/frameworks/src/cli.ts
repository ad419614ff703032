#!/usr/bin/env node

import { runFrameworksCommand } from "./command.js";

async function main(): Promise<void> {
  process.exitCode = await runFrameworksCommand(process.argv.slice(2), {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
  });
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
