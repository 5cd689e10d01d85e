import { z } from 'zod';

// ── Transport ─────────────────────────────────────────────────

export const httpMethodSchema = z.enum(['GET', 'POST', 'DELETE']);

export type HttpMethod = z.infer<typeof httpMethodSchema>;

/** `{sessionId, status, value}` wrapper around every response body. */
export const envelopeSchema = z.object({
  sessionId: z.unknown().optional(),
  status: z.number().int().optional().default(0),
  value: z.unknown().optional(),
});

export type Envelope = z.infer<typeof envelopeSchema>;

// ── Failure detail ────────────────────────────────────────────

export const stackFrameSchema = z.object({
  fileName: z.string().optional(),
  className: z.string().optional(),
  methodName: z.string().optional(),
  lineNumber: z.number().int().optional(),
});

export type StackFrame = z.infer<typeof stackFrameSchema>;

export const failureDetailSchema = z.object({
  message: z.string().optional(),
  screen: z.string().nullable().optional(),
  class: z.string().optional(),
  stackTrace: z.array(stackFrameSchema).optional(),
});

export type FailureDetail = z.infer<typeof failureDetailSchema>;

// ── Sessions ──────────────────────────────────────────────────

export const capabilitiesSchema = z.record(z.unknown());

export type Capabilities = z.infer<typeof capabilitiesSchema>;

export const sessionInfoSchema = z.object({
  id: z.string().min(1),
  capabilities: capabilitiesSchema.nullable().optional(),
});

export type SessionInfo = z.infer<typeof sessionInfoSchema>;

export const serverStatusSchema = z
  .object({
    build: z
      .object({
        version: z.string().optional(),
        revision: z.string().optional(),
        time: z.string().optional(),
      })
      .partial()
      .optional(),
    os: z
      .object({
        arch: z.string().optional(),
        name: z.string().optional(),
        version: z.string().optional(),
      })
      .partial()
      .optional(),
  })
  .passthrough();

export type ServerStatus = z.infer<typeof serverStatusSchema>;

// ── Elements and windows ──────────────────────────────────────

export const elementRefSchema = z.object({ ELEMENT: z.string().min(1) });

export type ElementRef = z.infer<typeof elementRefSchema>;

export const findStrategySchema = z.enum([
  'class name',
  'css selector',
  'id',
  'name',
  'link text',
  'partial link text',
  'tag name',
  'xpath',
]);

export type FindStrategy = z.infer<typeof findStrategySchema>;

export const sizeSchema = z.object({
  width: z.number(),
  height: z.number(),
});

export type Size = z.infer<typeof sizeSchema>;

export const positionSchema = z.object({
  x: z.number(),
  y: z.number(),
});

export type Position = z.infer<typeof positionSchema>;

// ── Browser state ─────────────────────────────────────────────

export const cookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  path: z.string().optional(),
  domain: z.string().optional(),
  secure: z.boolean().optional(),
  httpOnly: z.boolean().optional(),
  expiry: z.number().optional(),
});

export type Cookie = z.infer<typeof cookieSchema>;

export const geoLocationSchema = z.object({
  latitude: z.number(),
  longitude: z.number(),
  altitude: z.number(),
});

export type GeoLocation = z.infer<typeof geoLocationSchema>;

export const orientationSchema = z.enum(['LANDSCAPE', 'PORTRAIT']);

export type Orientation = z.infer<typeof orientationSchema>;

export const logEntrySchema = z.object({
  timestamp: z.number(),
  level: z.string(),
  message: z.string(),
});

export type LogEntry = z.infer<typeof logEntrySchema>;

export const timeoutTypeSchema = z.enum(['script', 'implicit', 'page load']);

export type TimeoutType = z.infer<typeof timeoutTypeSchema>;

/** Left, middle, right. */
export type MouseButton = 0 | 1 | 2;
