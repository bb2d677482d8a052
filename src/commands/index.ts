export { CommandProcessor } from './CommandProcessor.js';
export type { CommandProcessorOptions } from './CommandProcessor.js';
export { parseCommand } from './parser.js';
export { HELP_TEXT, GROUPS_HELP_TEXT } from './help.js';
export type {
  Command,
  CommandArgs,
  CommandName,
  CommandHandlers,
  GroupListAction,
  DuplicatesAction,
  TargetAction,
} from './types.js';
