import { inject, injectable } from "inversify";

import type { Translator } from "@/infra/i18n/translator";
import { ensureLogger, safePreview, type LoggerLike } from "@/infra/observability";

import { TranslatedUserError } from "./userError.errors";
import { parseUserErrorMessage } from "./userError.messageParser";
import { postgresUserErrorSource } from "./userError.sources";
import {
	DEFAULT_USER_ERROR_PREFIX,
	USER_ERROR_TYPES,
	type UserErrorSource,
} from "./userError.types";

export type UserErrorListenerOptions = {
	prefix: string;
	sources: readonly UserErrorSource[];
};

export function defaultUserErrorListenerOptions(): UserErrorListenerOptions {
	return {
		prefix: DEFAULT_USER_ERROR_PREFIX,
		sources: [postgresUserErrorSource()],
	};
}

/**
 * A user-error is raised by a database routine as a last check, e.g.
 *
 *   RAISE EXCEPTION 'app-exception: "order.too_large"|max:%', max_items;
 *
 * The listener recognizes such errors, translates them and hands back a
 * replacement error. Anything else is left for the caller to rethrow as-is.
 */
@injectable()
export class UserErrorExceptionListener {
	private readonly prefix: string;
	private readonly sources: readonly UserErrorSource[];

	constructor(
		@inject(USER_ERROR_TYPES.Translator)
		private readonly translator: Translator,
		@inject(USER_ERROR_TYPES.UserErrorListenerOptions)
		options: UserErrorListenerOptions
	) {
		this.prefix = options.prefix;
		this.sources = options.sources;
	}

	handle(error: unknown, locale?: string, log?: LoggerLike): TranslatedUserError | null {
		const lg = ensureLogger(log);

		const extracted = this.extractMessage(error);
		if (!extracted) return null;
		if (!extracted.message.startsWith(this.prefix)) return null;

		const parsed = parseUserErrorMessage(extracted.message.slice(this.prefix.length));
		const userMessage = this.translator.trans(parsed.key, parsed.parameters, locale);

		lg.debug(
			{
				source: extracted.source,
				key: parsed.key,
				parameters: Object.keys(parsed.parameters),
				locale: locale ?? this.translator.defaultLocale,
				preview: safePreview(extracted.message),
			},
			"Database user-error translated"
		);

		return new TranslatedUserError({
			userMessage,
			messageKey: parsed.key,
			parameters: parsed.parameters,
			cause: error,
		});
	}

	private extractMessage(error: unknown): { source: string; message: string } | null {
		for (const source of this.sources) {
			const message = source.extractMessage(error);
			if (message !== null) return { source: source.name, message };
		}
		return null;
	}
}
