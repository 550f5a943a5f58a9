export const USER_ERROR_TYPES = {
	Translator: Symbol.for("Translator"),
	UserErrorListenerOptions: Symbol.for("UserErrorListenerOptions"),
	UserErrorExceptionListener: Symbol.for("UserErrorExceptionListener"),
} as const;

export const DEFAULT_USER_ERROR_PREFIX = "app-exception: ";

export type ParsedUserErrorMessage = {
	/** Translation key, trimmed and unquoted. */
	key: string;
	/** `%name%` placeholders in order of appearance. */
	parameters: Readonly<Record<string, string>>;
};

/**
 * Decides whether an error carries a user-error and returns its raw message.
 * `null` means the error is not intercepted.
 */
export type UserErrorSource = {
	name: string;
	extractMessage: (error: unknown) => string | null;
};
