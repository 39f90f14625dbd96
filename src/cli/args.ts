/**
 * Command-line argument parsing for the triage CLI.
 */

export interface CliOptions {
  folder: string;
  help: boolean;
}

export type ParsedArgs =
  | { ok: true; options: CliOptions }
  | { ok: false; error: string };

export const USAGE = `
Inbox Triage

Reads unread mail from one folder, ranks it by urgency, drafts replies,
and walks you through sending them.

Usage:
  inbox-triage [--folder <name>]

Options:
  --folder, -f      Mailbox folder to read (default: inbox)
  --help, -h        Show this help message

Examples:
  inbox-triage
  inbox-triage --folder Support
`;

export function parseArgs(args: string[], defaultFolder = 'inbox'): ParsedArgs {
  const options: CliOptions = { folder: defaultFolder, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--folder' || arg === '-f') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('-') || value.trim() === '') {
        return { ok: false, error: `Option ${arg} needs a folder name` };
      }
      options.folder = value;
      i++;
    } else if (arg.startsWith('--folder=')) {
      const value = arg.slice('--folder='.length);
      if (value.trim() === '') {
        return { ok: false, error: 'Option --folder needs a folder name' };
      }
      options.folder = value;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      return { ok: false, error: `Unknown argument: ${arg}` };
    }
  }

  return { ok: true, options };
}
