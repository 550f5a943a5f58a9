import type { FastifyInstance } from "fastify";

import { getPool } from "@/infra/db";

export type DatabasePing = () => Promise<void>;

const pingPool: DatabasePing = async () => {
	await getPool().query("SELECT 1");
};

export function registerHealthRoutes(app: FastifyInstance, ping: DatabasePing = pingPool) {
	app.get("/health", async (req, reply) => {
		try {
			await ping();
			return reply.send({ status: "ok" });
		} catch (err) {
			req.log.warn({ err }, "Database health check failed");
			return reply.code(503).send({ status: "unavailable" });
		}
	});
}
