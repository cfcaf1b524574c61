import { z } from "zod";

/** Hard ceiling for `count`; the server may configure a lower one. */
export const MAX_TOKENS_PER_REQUEST = 10_000;

export const TokenEncodingSchema = z.enum(["hex", "base64url"]);

export type TokenEncoding = z.infer<typeof TokenEncodingSchema>;

export const TokenRequestSchema = z.object({
  text: z.string().describe("Raw input text, may be empty"),
  count: z
    .number()
    .int()
    .min(0)
    .max(MAX_TOKENS_PER_REQUEST)
    .optional()
    .describe("Number of tokens to return instead of one per word"),
});

export type TokenRequest = z.infer<typeof TokenRequestSchema>;

export const TokenResultSchema = z.object({
  checksum: z
    .string()
    .regex(/^[0-9a-f]{64}$/)
    .describe("Lowercase hex SHA-256 of the UTF-8 text"),
  tokens: z.array(z.string()),
});

export type TokenResult = z.infer<typeof TokenResultSchema>;

export const GenerateResultSchema = z.object({
  token: z.string(),
});

export type GenerateResult = z.infer<typeof GenerateResultSchema>;
