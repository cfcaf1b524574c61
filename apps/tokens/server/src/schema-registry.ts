import { z } from "zod";
import {
  ErrorResponseSchema,
  GenerateResultSchema,
  HealthResponseSchema,
  TokenRequestSchema,
  TokenResultSchema,
} from "@tokensmith/shared";

export const schemaRegistry: Record<string, z.ZodType> = {
  TokenRequest: TokenRequestSchema,
  TokenResult: TokenResultSchema,
  GenerateResult: GenerateResultSchema,
  HealthResponse: HealthResponseSchema,
  ErrorResponse: ErrorResponseSchema,
};

// Register schemas with Zod global registry for OpenAPI components/schemas population
for (const [name, schema] of Object.entries(schemaRegistry)) {
  if (!z.globalRegistry.has(schema)) {
    z.globalRegistry.add(schema, { id: name });
  }
}
