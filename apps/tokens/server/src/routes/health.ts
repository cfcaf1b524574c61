import { HealthResponse, HealthResponseSchema } from "@tokensmith/shared";
import { FastifyInstance, FastifyPluginOptions } from "fastify";

export default async function healthRoutes(
  fastify: FastifyInstance,
  _options: FastifyPluginOptions,
) {
  fastify.get<{ Reply: HealthResponse }>(
    "/health",
    {
      schema: {
        description: "Liveness probe",
        tags: ["System"],
        response: {
          200: HealthResponseSchema,
        },
      },
    },
    async () => {
      return { status: "ok" as const };
    },
  );
}
