import { z } from 'zod'

export const configSchema = z
  .object({
    provider: z.enum(['openai', 'echo']),
    model: z.string().min(1),
    systemPrompt: z.string(),
    onFailure: z.enum(['rollback', 'keep']),
    openai: z.object({
      apiKey: z.string(),
      baseUrl: z.string().url().optional(),
      timeoutMs: z.number().int().positive(),
      maxRetries: z.number().int().min(0)
    }),
    logging: z.object({
      enabled: z.boolean()
    })
  })
  .superRefine((config, ctx) => {
    if (config.provider === 'openai' && !config.openai.apiKey) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['openai', 'apiKey'],
        message: 'OPENAI_API_KEY is required when PARLEY_PROVIDER is openai'
      })
    }
  })

export type ParleyConfig = z.infer<typeof configSchema>
