/**
 * Storage Configuration Schema
 *
 * Connection settings for the PostgreSQL-backed generation and login-event
 * stores. Optional: hosts may supply their own store implementations.
 */

import { z } from 'zod';

export const PostgreSQLConfigSchema = z.object({
  host: z.string().min(1).describe('PostgreSQL hostname or IP'),
  port: z.number().int().min(1).max(65535).optional().default(5432).describe('PostgreSQL port'),
  database: z.string().min(1).describe('Database name'),
  user: z.string().min(1).describe('Service account username'),
  password: z
    .string()
    .min(1)
    .describe('Service account password (use {"$secret": "NAME"} in the config file)'),
  options: z
    .object({
      ssl: z.boolean().optional().default(false).describe('Enable SSL/TLS connection'),
    })
    .optional()
    .describe('PostgreSQL connection options'),
  pool: z
    .object({
      max: z.number().int().min(1).optional().default(10).describe('Maximum pool connections'),
      min: z.number().int().min(0).optional().default(0).describe('Minimum pool connections'),
      idleTimeoutMillis: z
        .number()
        .int()
        .min(1000)
        .optional()
        .default(30000)
        .describe('Idle timeout in milliseconds'),
      connectionTimeoutMillis: z
        .number()
        .int()
        .min(1000)
        .optional()
        .default(5000)
        .describe('Connection timeout in milliseconds'),
    })
    .optional()
    .describe('Connection pool settings'),
});

export const StorageConfigSchema = z.object({
  postgresql: PostgreSQLConfigSchema.optional().describe('PostgreSQL store settings'),
});

export type PostgreSQLConfig = z.infer<typeof PostgreSQLConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
