import { UserFacingError } from "@/infra/userFacingError";

export const DB_USER_ERROR_CODE = "DB_USER_ERROR";

/**
 * Replaces a database error whose message followed the user-error convention.
 * The original driver error stays reachable as `cause`.
 */
export class TranslatedUserError extends UserFacingError {
	public readonly messageKey: string;
	public readonly parameters: Readonly<Record<string, string>>;

	constructor(params: {
		userMessage: string;
		messageKey: string;
		parameters: Readonly<Record<string, string>>;
		cause: unknown;
	}) {
		super({
			userMessage: params.userMessage,
			code: DB_USER_ERROR_CODE,
			cause: params.cause,
		});
		this.name = "TranslatedUserError";
		this.messageKey = params.messageKey;
		this.parameters = params.parameters;
	}
}
