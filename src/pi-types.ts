import { z } from 'zod';

// ── Wire schemas ─────────────────────────────────────────────────────────────
// Only the fields this client reads are declared; everything else the server
// sends is kept via passthrough().

export const piScalarSchema = z.union([z.number(), z.string(), z.boolean()]);
export type PIScalar = z.infer<typeof piScalarSchema>;

/** Digital-state values come back as `{ Name, Value }` instead of a scalar. */
export const digitalStateSchema = z
  .object({
    Name: z.string(),
    Value: z.number(),
    IsSystem: z.boolean().optional(),
  })
  .passthrough();
export type PIDigitalState = z.infer<typeof digitalStateSchema>;

export const timedValueSchema = z
  .object({
    Timestamp: z.string().optional(),
    Value: z.union([piScalarSchema, digitalStateSchema, z.null()]).optional(),
    UnitsAbbreviation: z.string().optional(),
    Good: z.boolean().optional(),
    Questionable: z.boolean().optional(),
    Substituted: z.boolean().optional(),
    Annotated: z.boolean().optional(),
  })
  .passthrough();
export type PITimedValue = z.infer<typeof timedValueSchema>;

export const dataServerSchema = z
  .object({
    WebId: z.string(),
    Name: z.string(),
    Path: z.string().optional(),
    IsConnected: z.boolean().optional(),
    ServerVersion: z.string().optional(),
  })
  .passthrough();
export type PIDataServer = z.infer<typeof dataServerSchema>;

/** A point as listed by `/dataservers/{id}/points` or `/search/query`. */
export const pointItemSchema = z
  .object({
    WebId: z.string().min(1),
    Name: z.string().min(1),
  })
  .passthrough();
export type PIPointItem = z.infer<typeof pointItemSchema>;

/** `{ Items: [...] }` collection envelope. */
export function itemsEnvelope<T extends z.ZodTypeAny>(item: T) {
  return z.object({ Items: z.array(item).optional() }).passthrough();
}

export type PIResponseHeaders = Record<string, string>;

/** Status, body and headers of one PI Web API round trip. */
export interface PIResponse<T = unknown> {
  status: number;
  data: T;
  headers: PIResponseHeaders;
}

export function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}
