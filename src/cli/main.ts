#!/usr/bin/env node
/* eslint-disable no-console */
/**
 * Terminal front end: reads default.json from the working directory, sizes
 * the grid to the terminal and animates one generation per second until
 * interrupted.
 */
import { run, TerminalStream } from "./run";

/** Runs until SIGINT. Resolves with the process exit code. */
export async function main(stdout: TerminalStream = process.stdout, cwd = process.cwd()): Promise<number> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    await run({ stdout, cwd, signal: controller.signal });
    return 0;
  } catch (error) {
    console.error("life-explorer failed to start:", error instanceof Error ? error.message : error);
    return 1;
  } finally {
    process.off("SIGINT", onSigint);
  }
}

if (require.main === module) {
  main()
    .then((code) => process.exit(code))
    .catch((error) => {
      console.error("life-explorer crashed:", error);
      process.exit(1);
    });
}
