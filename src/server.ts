import Fastify from "fastify";
import cors from "@fastify/cors";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";

import { container } from "./container";
import { loadEnv } from "./config/env";
import type { Translator } from "./infra/i18n/translator";
import { registerHealthRoutes } from "./modules/health/health.controller";
import type { UserErrorExceptionListener } from "./modules/user-error/userError.listener";
import { USER_ERROR_TYPES } from "./modules/user-error/userError.types";
import { userErrorPlugin } from "./plugins/userErrors";

export async function buildServer() {
	const env = loadEnv();

	const app = Fastify({
		logger: env.NODE_ENV !== "test",
	});

	await app.register(cors, {
		origin: true,
		methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
		allowedHeaders: ["Accept-Language", "Authorization", "Content-Type"],
		maxAge: 86400,
	});

	// Swagger should not be exposed in production
	if (env.NODE_ENV !== "production") {
		await app.register(swagger, {
			openapi: {
				info: { title: "pg-user-errors", version: "1.0.0" },
			},
		});
		await app.register(swaggerUi, {
			routePrefix: "/docs",
		});
	}

	// Error handler first, so every route registered below is covered
	await app.register(userErrorPlugin, {
		listener: container.get<UserErrorExceptionListener>(
			USER_ERROR_TYPES.UserErrorExceptionListener
		),
		translator: container.get<Translator>(USER_ERROR_TYPES.Translator),
	});

	registerHealthRoutes(app);

	return { app, env };
}
