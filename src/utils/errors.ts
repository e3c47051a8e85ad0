export const ERROR_KIND = {
  PathNotFound: "PathNotFound",
  DecodeError: "DecodeError",
  StoreCorrupt: "StoreCorrupt",
  ProviderError: "ProviderError",
  BackupVerificationError: "BackupVerificationError",
  WriteError: "WriteError",
  RestoreError: "RestoreError"
} as const;

export type ErrorKind = (typeof ERROR_KIND)[keyof typeof ERROR_KIND];

export class BundleError extends Error {
  kind: ErrorKind;
  path?: string;
  constructor(kind: ErrorKind, message: string, path?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BundleError";
    this.kind = kind;
    this.path = path;
  }
}

export function isBundleError(e: unknown, kind?: ErrorKind): e is BundleError {
  return e instanceof BundleError && (kind === undefined || e.kind === kind);
}

export function getErrorMessage(e: unknown, fallback = "Unknown error"): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  return fallback;
}

export function isNodeError(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}
