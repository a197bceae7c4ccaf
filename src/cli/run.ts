/**
 * Shared stdin → handler → stdout loop for the hook executables.
 *
 * The host must always get a JSON line with continue: true, so a failure
 * anywhere in reading or handling prints that line instead.
 */

import { errorMessage } from '../shared/logger.js';
import { readStdin } from '../shared/stdin.js';
import type { HookOutput, UserPromptSubmitOutput } from '../shared/types.js';

export interface HookIo {
  read(): Promise<string>;
  write(line: string): void;
  reportError(message: string): void;
}

const processIo: HookIo = {
  read: () => readStdin(),
  write: (line) => {
    process.stdout.write(line);
  },
  reportError: (message) => {
    console.error(message);
  },
};

export const CONTINUE_LINE = `${JSON.stringify({ continue: true })}\n`;

export async function runHookCli(
  name: string,
  handle: (raw: string) => HookOutput | UserPromptSubmitOutput,
  io: HookIo = processIo
): Promise<void> {
  let line: string;
  try {
    line = `${JSON.stringify(handle(await io.read()))}\n`;
  } catch (err: unknown) {
    io.reportError(`[${name}] ${errorMessage(err)}`);
    line = CONTINUE_LINE;
  }
  io.write(line);
}
