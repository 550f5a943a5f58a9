import fp from "fastify-plugin";

import { negotiateLocale } from "@/infra/i18n/locale";
import type { Translator } from "@/infra/i18n/translator";
import { UserFacingError } from "@/infra/userFacingError";
import type { UserErrorExceptionListener } from "@/modules/user-error/userError.listener";

export type UserErrorPluginOptions = {
	listener: UserErrorExceptionListener;
	translator: Translator;
};

/**
 * Turns database user-errors into translated 422 responses.
 * Must be registered BEFORE the routes it should cover.
 */
export const userErrorPlugin = fp<UserErrorPluginOptions>(
	async (app, opts) => {
		app.setErrorHandler<Error>((error, request, reply) => {
			const locale = negotiateLocale(
				request.headers["accept-language"],
				opts.translator.locales,
				opts.translator.defaultLocale
			);

			const translated = opts.listener.handle(error, locale, request.log);
			if (translated) {
				return reply.code(422).send({
					error: translated.code,
					message: translated.userMessage,
					key: translated.messageKey,
					parameters: translated.parameters,
				});
			}

			if (error instanceof UserFacingError) {
				return reply.code(400).send({
					error: error.code,
					message: error.userMessage,
					details: error.details ?? null,
				});
			}

			// Not ours: let Fastify's default handler deal with it
			return reply.send(error);
		});
	},
	{ name: "user-errors" }
);
