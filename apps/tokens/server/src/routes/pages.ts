import { FastifyInstance, FastifyPluginOptions } from "fastify";

// 1x1 transparent PNG so browsers stop asking for a missing favicon
const FAVICON_PNG = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR4nGNgYAAAAAMAASsJTYQAAAAASUVORK5CYII=",
  "base64",
);

/** Browser-facing routes. Static files under /static/ come from @fastify/static. */
export default async function pagesRoutes(
  fastify: FastifyInstance,
  _options: FastifyPluginOptions,
) {
  fastify.get("/", { schema: { hide: true } }, async (_request, reply) => {
    return reply.type("text/html; charset=utf-8").sendFile("index.html");
  });

  fastify.get(
    "/favicon.ico",
    { schema: { hide: true } },
    async (_request, reply) => {
      return reply.type("image/png").send(FAVICON_PNG);
    },
  );

  // Older clients ask for the rocket under its .png name; the content is SVG
  fastify.get(
    "/static/rocket.png",
    { schema: { hide: true } },
    async (_request, reply) => {
      return reply.type("image/svg+xml").sendFile("rocket.svg");
    },
  );
}
