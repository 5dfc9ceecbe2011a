import * as verifyCommand from './verify';
import * as resetSessionCommand from './resetSession';
import { Command } from './types';

export const commands: Command[] = [
  verifyCommand,
  resetSessionCommand,
];

export { verifyCommand, resetSessionCommand };
export type { Command, CommandContext } from './types';
