import {
  ErrorResponseSchema,
  GenerateResult,
  GenerateResultSchema,
  TokenRequest,
  TokenRequestSchema,
  TokenResult,
  TokenResultSchema,
} from "@tokensmith/shared";
import { FastifyInstance, FastifyPluginOptions } from "fastify";
import type { TokenService } from "../services/tokenService.js";

export interface TokensRoutesOptions extends FastifyPluginOptions {
  tokenService: TokenService;
}

export default async function tokensRoutes(
  fastify: FastifyInstance,
  options: TokensRoutesOptions,
) {
  const { tokenService } = options;

  fastify.get<{ Reply: GenerateResult }>(
    "/generate",
    {
      schema: {
        description: "Generate a single pseudorandom token",
        tags: ["Tokens"],
        response: {
          200: GenerateResultSchema,
          500: ErrorResponseSchema,
        },
      },
    },
    async () => {
      return tokenService.handleGenerateRequest();
    },
  );

  fastify.post<{ Body: TokenRequest; Reply: TokenResult }>(
    "/tokens",
    {
      schema: {
        description:
          "Checksum the text and return one pseudorandom token per word",
        tags: ["Tokens"],
        body: TokenRequestSchema,
        response: {
          200: TokenResultSchema,
          400: ErrorResponseSchema,
          422: ErrorResponseSchema,
          500: ErrorResponseSchema,
        },
      },
    },
    async (request) => {
      return tokenService.handleTokensRequest(request.body);
    },
  );
}
