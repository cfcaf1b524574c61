import "dotenv/config";
// Important to load dotenv before any other imports, to ensure environment variables are available
import { commonErrorHandler } from "@tokensmith/common";
import cors from "@fastify/cors";
import staticFiles from "@fastify/static";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import Fastify from "fastify";
import {
  jsonSchemaTransform,
  jsonSchemaTransformObject,
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import apiRoutes from "./routes/api.js";
import { createServerConfig, type ServerConfig } from "./serverConfig.js";
import {
  cryptoRandomSource,
  type RandomSource,
} from "./services/randomSource.js";
import { TokenService } from "./services/tokenService.js";
import "./schema-registry.js";

export interface ServerDeps {
  randomSource?: RandomSource;
}

function loggerOptions(config: ServerConfig) {
  return config.prettyLogs
    ? // Log to console with colors in development
      {
        level: config.logLevel,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
          },
        },
      }
    : // JSON lines to stdout otherwise
      { level: config.logLevel };
}

/** Creates a fully configured server without binding a port. */
export async function buildServer(config: ServerConfig, deps: ServerDeps = {}) {
  const fastify = Fastify({
    logger: loggerOptions(config),
  }).withTypeProvider<ZodTypeProvider>();

  // Set Zod validator and serializer compilers
  fastify.setValidatorCompiler(validatorCompiler);
  fastify.setSerializerCompiler(serializerCompiler);

  fastify.setErrorHandler(commonErrorHandler);

  fastify.setNotFoundHandler((request, reply) => {
    reply.code(404).send({
      statusCode: 404,
      error: "Not Found",
      message: `Route ${request.method}:${request.url} not found`,
    });
  });

  if (config.corsOrigins.length > 0) {
    await fastify.register(cors, { origin: config.corsOrigins });
  }

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: "Tokensmith API",
        description: "Generate pseudorandom tokens and text checksums",
        version: "1.0.0",
      },
    },
    transform: jsonSchemaTransform,
    transformObject: jsonSchemaTransformObject,
  });

  if (config.apiDocs) {
    await fastify.register(swaggerUi, { routePrefix: "/docs" });
  }

  fastify.get("/openapi.json", { schema: { hide: true } }, async () => {
    return fastify.swagger();
  });

  await fastify.register(staticFiles, {
    root: config.publicDir,
    prefix: "/static/",
  });

  const tokenService = new TokenService(
    deps.randomSource ?? cryptoRandomSource,
    {
      tokenBytes: config.tokenBytes,
      encoding: config.tokenEncoding,
      maxTokens: config.maxTokens,
    },
    fastify.log,
  );

  await fastify.register(apiRoutes, { tokenService });

  return fastify;
}

export async function startServer(config: ServerConfig = createServerConfig()) {
  const fastify = await buildServer(config);
  const logger = fastify.log;

  const shutdown = (signal: string) => {
    logger.info({ signal }, "Shutting down");
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, "Error during shutdown");
        process.exit(1);
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    let port = config.port;
    const maxAttempts = 100;
    let attempts = 0;

    while (attempts < maxAttempts) {
      try {
        await fastify.listen({ port, host: config.host });
        logger.info(`Tokensmith running on http://${config.host}:${port}/`);
        return port;
      } catch (err) {
        if (
          err instanceof Error &&
          "code" in err &&
          err.code === "EADDRINUSE"
        ) {
          logger.warn(`Port ${port} is in use, trying port ${port + 1}...`);
          port++;
          attempts++;
        } else {
          throw err;
        }
      }
    }
    throw new Error(
      `Unable to find available port after ${maxAttempts} attempts`,
    );
  } catch (err) {
    logger.error({ err }, "Failed to start");
    process.exit(1);
  }
}

// Start server if this file is run directly
if (require.main === module) {
  startServer().catch((err: unknown) => {
    console.error("[Tokensmith] Failed to start:", err);
    process.exit(1);
  });
}
