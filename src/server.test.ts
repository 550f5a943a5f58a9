import { DatabaseError } from "pg";
import { afterAll, beforeAll, describe, expect, it } from "vitest";

import { buildServer } from "./server";

describe("buildServer", () => {
	const savedDatabaseUrl = process.env.DATABASE_URL;
	let app: Awaited<ReturnType<typeof buildServer>>["app"];

	beforeAll(async () => {
		delete process.env.DATABASE_URL;

		const server = await buildServer();
		app = server.app;

		app.post("/accounts/:id/lock", async () => {
			const err = new DatabaseError(
				'app-exception: "account.locked"',
				31,
				"error"
			);
			err.code = "P0001";
			throw err;
		});
	});

	afterAll(async () => {
		await app.close();
		if (savedDatabaseUrl !== undefined) process.env.DATABASE_URL = savedDatabaseUrl;
	});

	it("translates user-errors with the bundled catalogs", async () => {
		const res = await app.inject({
			method: "POST",
			url: "/accounts/a-1/lock",
			headers: { "accept-language": "nl" },
		});

		expect(res.statusCode).toBe(422);
		expect(res.json()).toEqual({
			error: "DB_USER_ERROR",
			message: "Dit account is geblokkeerd.",
			key: "account.locked",
			parameters: {},
		});
	});

	it("reports the database as unavailable without DATABASE_URL", async () => {
		const res = await app.inject({ method: "GET", url: "/health" });

		expect(res.statusCode).toBe(503);
		expect(res.json()).toEqual({ status: "unavailable" });
	});
});
