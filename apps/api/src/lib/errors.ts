export type AdminAccessErrorCode =
  | "UnknownAdmin"
  | "RateLimited"
  | "NoActiveChallenge"
  | "Expired"
  | "InvalidCode"
  | "Exhausted"
  | "InvalidCredential"
  | "PermissionDenied"
  | "SelfDemotionForbidden"
  | "StorageFailure"
  | "NotificationFailure"
  | "UserNotFound"
  | "IneligibleUser"
  | "AlreadyAdmin"
  | "AlreadyDeactivated";

const defaultStatus: Record<AdminAccessErrorCode, number> = {
  UnknownAdmin: 404,
  RateLimited: 429,
  NoActiveChallenge: 400,
  Expired: 400,
  InvalidCode: 400,
  Exhausted: 400,
  InvalidCredential: 401,
  PermissionDenied: 403,
  SelfDemotionForbidden: 403,
  StorageFailure: 500,
  NotificationFailure: 502,
  UserNotFound: 404,
  IneligibleUser: 400,
  AlreadyAdmin: 409,
  AlreadyDeactivated: 409
};

export class AdminAccessError extends Error {
  readonly code: AdminAccessErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(
    code: AdminAccessErrorCode,
    message: string,
    options: { statusCode?: number; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "AdminAccessError";
    this.code = code;
    this.statusCode = options.statusCode ?? defaultStatus[code];
    this.details = options.details;
  }
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
