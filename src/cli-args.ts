export type CliCommand =
  | { command: 'run'; prompt: string; drafts: number | null; apiKey: string | null }
  | { command: 'archive'; path: string }
  | { command: 'invalid'; reason: string };

export const USAGE =
  'Usage: draft-room run [prompt] [--drafts N] [--api-key KEY] | draft-room archive <path>';

/** Matches `--name value` and `--name=value`; returns the value and how many args it used. */
function readOption(args: string[], i: number, name: string): { raw: string | undefined; used: number } | null {
  const arg = args[i] ?? '';
  if (arg === name) return { raw: args[i + 1], used: 2 };
  if (arg.startsWith(`${name}=`)) return { raw: arg.slice(name.length + 1), used: 1 };
  return null;
}

function parseRun(args: string[]): CliCommand {
  const words: string[] = [];
  let drafts: number | null = null;
  let apiKey: string | null = null;

  for (let i = 0; i < args.length; ) {
    const draftsOpt = readOption(args, i, '--drafts');
    if (draftsOpt) {
      const n = Number(draftsOpt.raw);
      if (!Number.isInteger(n) || n < 1) {
        return { command: 'invalid', reason: `--drafts needs a positive integer, got ${draftsOpt.raw ?? '(nothing)'}` };
      }
      drafts = n;
      i += draftsOpt.used;
      continue;
    }

    const keyOpt = readOption(args, i, '--api-key');
    if (keyOpt) {
      if (!keyOpt.raw?.trim()) return { command: 'invalid', reason: '--api-key needs a value' };
      apiKey = keyOpt.raw.trim();
      i += keyOpt.used;
      continue;
    }

    words.push(args[i] ?? '');
    i++;
  }
  return { command: 'run', prompt: words.join(' ').trim(), drafts, apiKey };
}

/** `argv` excludes the node binary and script path. */
export function parseCliArgs(argv: string[]): CliCommand {
  const [command, ...rest] = argv;
  switch (command) {
    case 'run':
      return parseRun(rest);
    case 'archive':
      return rest[0] ? { command: 'archive', path: rest[0] } : { command: 'invalid', reason: 'archive needs a path' };
    default:
      return { command: 'invalid', reason: `Unknown command: ${command ?? '(none)'}` };
  }
}
