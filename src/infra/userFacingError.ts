export class UserFacingError extends Error {
  public readonly userMessage: string;
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(params: {
    userMessage: string;
    code?: string;
    debugMessage?: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(
      params.debugMessage ?? params.userMessage,
      params.cause === undefined ? undefined : { cause: params.cause },
    );
    this.name = "UserFacingError";
    this.userMessage = params.userMessage;
    this.code = params.code ?? "USER_ERROR";
    this.details = params.details;
  }
}
