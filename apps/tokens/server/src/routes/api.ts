import { FastifyInstance } from "fastify";
import type { TokenService } from "../services/tokenService.js";
import healthRoutes from "./health.js";
import pagesRoutes from "./pages.js";
import tokensRoutes from "./tokens.js";

export interface ApiRoutesOptions {
  tokenService: TokenService;
}

export default async function apiRoutes(
  fastify: FastifyInstance,
  options: ApiRoutesOptions,
) {
  // Register browser routes (form, favicon)
  await fastify.register(pagesRoutes);

  // Register token routes
  await fastify.register(tokensRoutes, { tokenService: options.tokenService });

  // Register health routes
  await fastify.register(healthRoutes);
}
