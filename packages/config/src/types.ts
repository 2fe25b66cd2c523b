import { z } from 'zod';

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'http', 'debug']);

const routeSchema = z.string().startsWith('/', { message: 'route must start with /' });

// Mount configuration: one entry per served route
export const MountConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('directory'),
    route: routeSchema,
    root: z.string().min(1),
  }),
  z.object({
    type: z.literal('favicon'),
    route: routeSchema.default('/favicon.ico'),
    file: z.string().min(1),
  }),
  z.object({
    type: z.literal('download'),
    route: routeSchema,
    file: z.string().min(1),
  }),
  z.object({
    type: z.literal('static'),
    route: routeSchema,
    file: z.string().min(1),
    mediaType: z.string().optional(),
  }),
]);

// Server configuration schema
export const ServerConfigSchema = z.object({
  host: z.string().default('127.0.0.1'),
  port: z.number().int().min(0).max(65535).default(8080),
  logLevel: LogLevelSchema.optional(),
  mimeOverrides: z.record(z.string().startsWith('.'), z.string()).optional(),
  mounts: z.array(MountConfigSchema).default([]),
});

export type LogLevel = z.infer<typeof LogLevelSchema>;
export type MountConfig = z.infer<typeof MountConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
