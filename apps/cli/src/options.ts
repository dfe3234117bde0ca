import { z } from 'zod';

export const DEFAULT_MAIL_ROOT = '/var/mail';

export const USAGE = `Usage: mailspool [user] [options]

Browse the mbox mail spool of one or all users.

Options:
  -r, --root <dir>       Mail spool directory (default: $MAIL_SPOOL or ${DEFAULT_MAIL_ROOT})
  -x, --exclude <users>  Skip these users; repeatable, comma-separated
  -h, --help             Show this help

Keys:
  PgDn/n  PgUp/p   next / previous mail
  Home/g  End/G    first / last mail
  Down/j  Up/k     scroll one line
  Space   b        scroll one page
  <number> Enter   jump to mail number
  Tab/]   [        next / previous mailbox
  q/Esc            quit`;

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const cliOptionsSchema = z.object({
  root: z.string().min(1, 'mail spool directory must not be empty'),
  user: z
    .string()
    .min(1)
    .refine((value) => !/[\\/]/.test(value) && value !== '.' && value !== '..', {
      message: 'user must be a plain mailbox name',
    })
    .optional(),
  exclude: z.array(z.string().min(1)),
  help: z.boolean(),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

function splitFlag(arg: string): [string, string | undefined] {
  if (!arg.startsWith('--')) return [arg, undefined];
  const eq = arg.indexOf('=');
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}

export function parseArgs(
  argv: readonly string[],
  env: Record<string, string | undefined> = {}
): CliOptions {
  let root = env.MAIL_SPOOL || DEFAULT_MAIL_ROOT;
  let user: string | undefined;
  const exclude: string[] = [];
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const [flag, inline] = splitFlag(argv[i]);

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) {
        throw new UsageError(`${flag} requires a value`);
      }
      i++;
      return next;
    };

    switch (flag) {
      case '-h':
      case '--help':
        help = true;
        break;
      case '-r':
      case '--root':
        root = takeValue();
        break;
      case '-x':
      case '--exclude':
        exclude.push(
          ...takeValue()
            .split(',')
            .map((name) => name.trim())
            .filter(Boolean)
        );
        break;
      default:
        if (flag.startsWith('-')) throw new UsageError(`Unknown option: ${flag}`);
        if (user !== undefined) throw new UsageError(`Only one user can be given (got ${user} and ${flag})`);
        user = flag;
    }
  }

  const result = cliOptionsSchema.safeParse({ root, user, exclude, help });
  if (!result.success) {
    throw new UsageError(result.error.issues.map((issue) => issue.message).join('; '));
  }
  return result.data;
}
