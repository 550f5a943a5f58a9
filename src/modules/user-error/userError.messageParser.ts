import type { ParsedUserErrorMessage } from "./userError.types";

/**
 * Parses the body of a user-error (the part after the prefix):
 *
 *   "translation-key"|param1:value|param2:"quoted | value"
 *
 * Key and values may be double-quoted; a literal quote inside is written as `""`.
 * Never throws: input the grammar cannot split comes back whole as the key.
 */
export function parseUserErrorMessage(input: string): ParsedUserErrorMessage {
	const keyStart = skipWhitespace(input, 0);

	if (keyStart === input.length) {
		return { key: input.length ? "" : input, parameters: {} };
	}
	if (input[keyStart] === "|") {
		return { key: input, parameters: {} };
	}

	const keyEnd = scanKeyEnd(input, keyStart);
	const key = normalizeValue(input.slice(keyStart, keyEnd));
	const tail = input.slice(keyEnd);

	if (!tail.includes("|")) {
		return { key, parameters: {} };
	}

	const { parameters, complete } = scanParameters(tail);

	// A key that opens a quote without forming a whole quoted token needs a well-formed tail
	if (!complete && isIncompleteQuotedKey(input, keyStart, keyEnd)) {
		return { key: input, parameters: {} };
	}

	return { key, parameters };
}

function isIncompleteQuotedKey(input: string, keyStart: number, keyEnd: number): boolean {
	return input[keyStart] === '"' && scanQuoted(input, keyStart) !== keyEnd;
}

function scanKeyEnd(input: string, start: number): number {
	if (input[start] === '"') {
		const quoteEnd = scanQuoted(input, start);
		if (quoteEnd !== null) {
			const next = skipWhitespace(input, quoteEnd);
			if (next === input.length || input[next] === "|") return quoteEnd;
		}
	}

	return scanUnquoted(input, start);
}

/**
 * `complete` is false when a malformed segment stopped the scan early.
 */
function scanParameters(tail: string): {
	parameters: Record<string, string>;
	complete: boolean;
} {
	const parameters: Record<string, string> = {};
	let pos = 0;

	for (;;) {
		pos = skipWhitespace(tail, pos);
		if (pos === tail.length) return { parameters, complete: true };
		if (tail[pos] !== "|") break;
		pos = skipWhitespace(tail, pos + 1);

		const nameEnd = scanName(tail, pos);
		if (nameEnd === pos || tail[nameEnd] !== ":") break;
		const name = tail.slice(pos, nameEnd);

		const valueStart = skipWhitespace(tail, nameEnd + 1);
		const quoteEnd = tail[valueStart] === '"' ? scanQuoted(tail, valueStart) : null;

		if (quoteEnd !== null) {
			parameters[`%${name}%`] = normalizeValue(tail.slice(valueStart, quoteEnd));
			// anything between the closing quote and the next pipe is dropped
			pos = scanUnquoted(tail, quoteEnd);
			continue;
		}

		const valueEnd = scanUnquoted(tail, valueStart);
		if (valueEnd === valueStart) break;

		parameters[`%${name}%`] = normalizeValue(tail.slice(valueStart, valueEnd));
		pos = valueEnd;
	}

	return { parameters, complete: false };
}

/**
 * Returns the index just past the closing quote, or null when the token
 * is empty (`""`) or never closes.
 */
function scanQuoted(input: string, start: number): number | null {
	let pos = start + 1;

	while (pos < input.length) {
		if (input[pos] !== '"') {
			pos++;
			continue;
		}
		if (input[pos + 1] === '"') {
			pos += 2;
			continue;
		}
		return pos === start + 1 ? null : pos + 1;
	}

	return null;
}

function scanUnquoted(input: string, start: number): number {
	const pipe = input.indexOf("|", start);
	return pipe === -1 ? input.length : pipe;
}

function scanName(input: string, start: number): number {
	if (!/[A-Za-z_]/.test(input[start] ?? "")) return start;

	let pos = start + 1;
	while (pos < input.length && /[A-Za-z0-9_]/.test(input[pos] ?? "")) pos++;
	return pos;
}

function skipWhitespace(input: string, start: number): number {
	let pos = start;
	while (pos < input.length && /\s/.test(input[pos] ?? "")) pos++;
	return pos;
}

function normalizeValue(raw: string): string {
	const value = raw.trim();
	if (!value.startsWith('"')) return value;

	return value.slice(1, -1).replaceAll('""', '"');
}
