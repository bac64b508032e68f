/**
 * Zod schemas for MCP service records.
 * Input reaching the service directory (CLI, config imports, database rows) is validated here.
 */
import { z } from 'zod';
import { SERVICE_TRANSPORTS } from '@main/core/interfaces';

// ============================================================================
// Common Schemas
// ============================================================================

export const ServiceIdSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, 'service id must match [a-zA-Z0-9_-]+');

export const ToolStateSchema = z.object({
  name: z.string(),
  enabled: z.boolean(),
});

export const ToolStatesSchema = z.array(ToolStateSchema);

export const StringArraySchema = z.array(z.string());

// ============================================================================
// Service Schemas
// ============================================================================

/** Loose input accepted by upsert; normalization happens before validation. */
export const ServiceInputSchema = z.object({
  id: z.string().optional(),
  name: z.string().optional(),
  endpoint: z.string().optional(),
  command: z.string().optional(),
  args: StringArraySchema.optional(),
  transport: z.string().optional(),
  authToken: z.string().optional(),
  enabled: z.boolean().optional(),
  toolStates: ToolStatesSchema.optional(),
});

const HTTP_ENDPOINT = /^https?:\/\//i;

/** A normalized service record as it is about to be stored. */
export const ServiceRecordSchema = z
  .object({
    id: ServiceIdSchema,
    name: z.string().min(1, 'service name is required'),
    endpoint: z.string(),
    command: z.string(),
    args: StringArraySchema,
    transport: z.string(),
    authToken: z.string().optional(),
    enabled: z.boolean(),
    toolStates: z.array(
      ToolStateSchema.extend({
        name: z.string().trim().min(1, 'service tool state name is required'),
      })
    ),
    updatedAt: z.number(),
  })
  .superRefine((service, ctx) => {
    switch (service.transport) {
      case 'streamable_http':
      case 'sse':
        if (service.endpoint === '') {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['endpoint'],
            message: 'service endpoint is required',
          });
        } else if (!HTTP_ENDPOINT.test(service.endpoint)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['endpoint'],
            message: 'service endpoint must start with http:// or https://',
          });
        }
        break;
      case 'stdio':
        if (service.command === '') {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['command'],
            message: 'stdio service command is required',
          });
        }
        break;
      default:
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['transport'],
          message: `service transport must be one of ${SERVICE_TRANSPORTS.join(', ')}`,
        });
    }
  });

export type ServiceInputPayload = z.infer<typeof ServiceInputSchema>;
