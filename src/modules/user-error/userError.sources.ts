import { DatabaseError } from "pg";

import type { UserErrorSource } from "./userError.types";

export const DEFAULT_USER_ERROR_SQLSTATES = ["P0001"] as const;

// PDO-style drivers put the SQLSTATE and server severity in front of the text.
const SQLSTATE_WRAPPER =
	/^SQLSTATE\[([0-9A-Z]{5})\]: Raise exception: \d+ ERROR: {2}(.+)/;

/**
 * `RAISE EXCEPTION` from PL/pgSQL surfaces as a pg DatabaseError with SQLSTATE P0001.
 * Other SQLSTATEs are never user-errors.
 */
export function postgresUserErrorSource(options?: {
	sqlStates?: readonly string[];
}): UserErrorSource {
	const sqlStates = new Set<string>(
		options?.sqlStates ?? DEFAULT_USER_ERROR_SQLSTATES
	);

	return {
		name: "postgres",
		extractMessage: (error) => {
			if (!(error instanceof DatabaseError)) return null;
			if (!error.code || !sqlStates.has(error.code)) return null;

			return unwrapSqlStateMessage(error.message, error.code);
		},
	};
}

export function unwrapSqlStateMessage(message: string, sqlState: string): string {
	const wrapped = SQLSTATE_WRAPPER.exec(message);
	if (wrapped && wrapped[1] === sqlState && wrapped[2] !== undefined) {
		return wrapped[2];
	}
	return message;
}

/**
 * For drivers that report the raised text as the plain error message.
 */
export function errorClassUserErrorSource(
	name: string,
	errorClass: abstract new (...args: never[]) => Error
): UserErrorSource {
	return {
		name,
		extractMessage: (error) =>
			error instanceof errorClass ? error.message : null,
	};
}
