export type MailboxErrorKind = 'NotFound' | 'IoError';

/** A mailbox file could not be read. Fatal for that mailbox only. */
export class MailboxError extends Error {
  readonly kind: MailboxErrorKind;
  readonly path: string;
  readonly code?: string;

  constructor(input: { kind: MailboxErrorKind; path: string; message: string; code?: string; cause?: unknown }) {
    super(input.message, { cause: input.cause });
    this.name = 'MailboxError';
    this.kind = input.kind;
    this.path = input.path;
    this.code = input.code;
  }
}

export class MailboxNotFoundError extends MailboxError {
  constructor(input: { path: string; code?: string; cause?: unknown; message?: string }) {
    super({
      kind: 'NotFound',
      path: input.path,
      code: input.code,
      cause: input.cause,
      message: input.message ?? `Mailbox not found: ${input.path}`,
    });
    this.name = 'MailboxNotFoundError';
  }
}

export class MailboxReadError extends MailboxError {
  constructor(input: { path: string; code?: string; cause?: unknown; message?: string }) {
    super({
      kind: 'IoError',
      path: input.path,
      code: input.code,
      cause: input.cause,
      message: input.message ?? `Unable to read mailbox ${input.path}${input.code ? ` (${input.code})` : ''}`,
    });
    this.name = 'MailboxReadError';
  }
}

export function isMailboxError(error: unknown): error is MailboxError {
  return error instanceof MailboxError;
}

const NOT_FOUND_CODES = new Set(['ENOENT', 'ENOTDIR', 'EISDIR']);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Map a filesystem failure for `path` onto the mailbox error taxonomy. */
export function toMailboxError(path: string, error: unknown): MailboxError {
  if (isMailboxError(error)) return error;
  const code = errorCode(error);
  if (code && NOT_FOUND_CODES.has(code)) {
    return new MailboxNotFoundError({ path, code, cause: error });
  }
  return new MailboxReadError({ path, code, cause: error });
}
