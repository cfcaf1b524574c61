import { z } from "zod";

// Error response schema
export const ErrorResponseSchema = z.object({
  statusCode: z.number(),
  error: z.string(),
  message: z.string(),
});

// Inferred types
export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;
