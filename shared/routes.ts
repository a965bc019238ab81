import { z } from 'zod';
import {
  insertEmployeeSchema,
  insertPreferenceSchema,
  seedSchema,
  type InsertEmployee,
  type Preference,
  type ScheduleResult,
} from './schema';

// ============================================
// SHARED ERROR SCHEMAS
// ============================================
export const errorSchemas = {
  validation: z.object({
    message: z.string(),
    field: z.string().optional(),
  }),
  tooManyRequests: z.object({
    message: z.string(),
  }),
  internal: z.object({
    message: z.string(),
  }),
};

// ============================================
// API CONTRACT
// ============================================
export const api = {
  employees: {
    list: {
      method: 'GET' as const,
      path: '/api/employees',
      responses: {
        200: z.array(z.string()),
      },
    },
    create: {
      method: 'POST' as const,
      path: '/api/employees',
      input: insertEmployeeSchema,
      responses: {
        201: z.custom<InsertEmployee>(),
        400: errorSchemas.validation,
      },
    },
  },

  preferences: {
    list: {
      method: 'GET' as const,
      path: '/api/preferences',
      responses: {
        200: z.array(z.custom<Preference>()),
      },
    },
    create: {
      method: 'POST' as const,
      path: '/api/preferences',
      input: insertPreferenceSchema,
      responses: {
        201: z.custom<Preference>(),
        400: errorSchemas.validation,
      },
    },
  },

  schedule: {
    generate: {
      method: 'POST' as const,
      path: '/api/schedule/generate',
      input: z.object({
        seed: seedSchema.optional(), // Pins the random top-up for this run
      }),
      responses: {
        201: z.custom<ScheduleResult>(),
        400: errorSchemas.validation,
        429: errorSchemas.tooManyRequests,
      },
    },
  },
};
