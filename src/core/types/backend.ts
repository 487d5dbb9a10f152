import { z } from 'zod'

export const BACKEND_TYPES = ['simulated', 'openai-compatible'] as const

export type BackendType = (typeof BACKEND_TYPES)[number]

// BackendDefinition names a backend and the options its factory receives
export const BackendDefinitionSchema = z.object({
  id: z.string().min(1, 'Backend id is required'),
  name: z.string().optional(),
  type: z.enum(BACKEND_TYPES).optional(), // Inherited when the definition extends another
  extends: z.string().optional(),
  options: z.record(z.string(), z.unknown()).optional(),
})

export type BackendDefinition = z.infer<typeof BackendDefinitionSchema>
