import { DEFAULT_LOCALE, translate } from './i18n';

export type TraceabilityErrorCode =
  | 'NO_RESULT_ARTIFACTS'
  | 'CATALOG_UNREADABLE'
  | 'CATALOG_INVALID'
  | 'CONFIG_INVALID'
  | 'OUTPUT_WRITE_FAILED';

export interface TraceabilityErrorOptions {
  messageParams?: Record<string, unknown>;
  locale?: string;
  details?: unknown;
}

const messageKeys: Record<TraceabilityErrorCode, string> = {
  NO_RESULT_ARTIFACTS: 'errors.noResultArtifacts',
  CATALOG_UNREADABLE: 'errors.catalogUnreadable',
  CATALOG_INVALID: 'errors.catalogInvalid',
  CONFIG_INVALID: 'errors.configInvalid',
  OUTPUT_WRITE_FAILED: 'errors.outputWriteFailed',
};

export class TraceabilityError extends Error {
  public readonly code: TraceabilityErrorCode;

  public readonly messageKey: string;

  public readonly messageParams?: Record<string, unknown>;

  public readonly details?: unknown;

  constructor(code: TraceabilityErrorCode, options: TraceabilityErrorOptions = {}) {
    const messageKey = messageKeys[code];
    super(
      translate(messageKey, {
        locale: options.locale ?? DEFAULT_LOCALE,
        values: options.messageParams,
      }),
    );
    this.name = 'TraceabilityError';
    this.code = code;
    this.messageKey = messageKey;
    this.messageParams = options.messageParams;
    this.details = options.details;
  }
}

const isErrorLike = (error: unknown): error is { message: unknown; code?: unknown } =>
  typeof error === 'object' && error !== null && 'message' in error;

/**
 * Errors raised inside Node (fs, TextDecoder) can come from another realm
 * under Jest, so these read fields instead of relying on `instanceof`.
 */
export const describeError = (error: unknown): string =>
  isErrorLike(error) && typeof error.message === 'string' ? error.message : String(error);

/** The `code` of a Node system error such as `ENOENT`, if there is one. */
export const errorCode = (error: unknown): string | undefined =>
  isErrorLike(error) && typeof error.code === 'string' ? error.code : undefined;
