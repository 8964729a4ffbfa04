import { z } from 'zod'
import { ParseError } from './error'

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().int(),
  token_type: z.string().optional()
})

export const tokenErrorSchema = z.object({
  status: z.number().int().optional(),
  message: z.string()
})

export const channelSchema = z.object({
  broadcaster_id: z.string(),
  broadcaster_login: z.string(),
  broadcaster_name: z.string(),
  broadcaster_language: z.string(),
  game_id: z.string(),
  game_name: z.string(),
  title: z.string(),
  delay: z.number(),
  tags: z.array(z.string()).optional(),
  content_classification_labels: z.array(z.string()).optional(),
  is_branded_content: z.boolean().optional()
})

export const gameSchema = z.object({
  id: z.string(),
  name: z.string(),
  box_art_url: z.string(),
  igdb_id: z.string().optional()
})

const envelopeSchema = z.object({
  data: z.array(z.unknown())
})

export const parseJson = (body: string): unknown => {
  try {
    return JSON.parse(body)
  } catch (e) {
    throw new ParseError('Response body is not valid JSON', [], { cause: e })
  }
}

/**
 * Parses the `data` array of a Helix response, keeping the order the API returned
 */
export const parseData = <Output>(
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  body: string
): Output[] => {
  const envelope = envelopeSchema.safeParse(parseJson(body))
  if (!envelope.success) {
    throw new ParseError('Response body has no data array', envelope.error.issues)
  }
  return envelope.data.data.map((item, index) => {
    const record = schema.safeParse(item)
    if (!record.success) {
      const issues = record.error.issues.map((issue) => ({
        ...issue,
        path: ['data', index, ...issue.path]
      }))
      throw new ParseError(`Unexpected record at data[${index}]`, issues)
    }
    return record.data
  })
}
