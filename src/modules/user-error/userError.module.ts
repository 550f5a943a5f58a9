import path from "node:path";
import type { Container } from "inversify";

import { loadEnv, type Env } from "@/config/env";
import { loadCatalogs } from "@/infra/i18n/catalog.loader";
import { CatalogTranslator, type Translator } from "@/infra/i18n/translator";

import {
	UserErrorExceptionListener,
	type UserErrorListenerOptions,
} from "./userError.listener";
import { postgresUserErrorSource } from "./userError.sources";
import { USER_ERROR_TYPES } from "./userError.types";

export function userErrorListenerOptionsFromEnv(env: Env): UserErrorListenerOptions {
	return {
		prefix: env.USER_ERROR_PREFIX,
		sources: [postgresUserErrorSource({ sqlStates: env.USER_ERROR_SQLSTATES })],
	};
}

export function createTranslatorFromEnv(env: Env): Translator {
	const dir = path.resolve(process.cwd(), env.LOCALES_DIR ?? "locales");

	return new CatalogTranslator({
		catalogs: loadCatalogs(dir),
		defaultLocale: env.DEFAULT_LOCALE,
	});
}

export function registerUserErrorModule(container: Container) {
	container
		.bind<Translator>(USER_ERROR_TYPES.Translator)
		.toDynamicValue(() => createTranslatorFromEnv(loadEnv()))
		.inSingletonScope();

	container
		.bind<UserErrorListenerOptions>(USER_ERROR_TYPES.UserErrorListenerOptions)
		.toDynamicValue(() => userErrorListenerOptionsFromEnv(loadEnv()))
		.inSingletonScope();

	container
		.bind<UserErrorExceptionListener>(USER_ERROR_TYPES.UserErrorExceptionListener)
		.to(UserErrorExceptionListener)
		.inSingletonScope();
}
