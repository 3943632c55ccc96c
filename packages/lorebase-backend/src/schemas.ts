import Ajv, { ErrorObject } from 'ajv'
import addFormats from 'ajv-formats'
import { MAX_EF, MAX_TOP_K } from './kb/retriever'

const ajv = new Ajv({ allErrors: true, strict: false })
addFormats(ajv)

export interface FilterBody {
  source?: string
  tags?: string[]
}

export interface IngestBody {
  documents: {
    source: string
    text: string
    tags?: string[]
    metadata?: Record<string, unknown>
    discoveredAt?: string
  }[]
}

export interface QueryBody {
  question: string
  topK?: number
  ef?: number
  filter?: FilterBody
}

export interface SearchBody {
  query: string
  topK?: number
  ef?: number
  threshold?: number
  filter?: FilterBody
}

export interface SummarizeBody {
  topic: string
  topK?: number
  maxWords?: number
  filter?: FilterBody
}

const text = { type: 'string', minLength: 1, maxLength: 4000 }
const topK = { type: 'integer', minimum: 1, maximum: MAX_TOP_K }
const ef = { type: 'integer', minimum: 1, maximum: MAX_EF }
const filter = {
  type: 'object',
  additionalProperties: false,
  properties: {
    source: { type: 'string', minLength: 1 },
    tags: { type: 'array', items: { type: 'string', minLength: 1 }, maxItems: 32 },
  },
}

export const validateIngest = ajv.compile<IngestBody>({
  type: 'object',
  required: ['documents'],
  additionalProperties: false,
  properties: {
    documents: {
      type: 'array',
      minItems: 1,
      maxItems: 1000,
      items: {
        type: 'object',
        required: ['source', 'text'],
        additionalProperties: false,
        properties: {
          source: { type: 'string', minLength: 1, maxLength: 512 },
          text: { type: 'string' },
          tags: { type: 'array', items: { type: 'string', minLength: 1 }, maxItems: 32 },
          metadata: { type: 'object' },
          discoveredAt: { type: 'string', format: 'date-time' },
        },
      },
    },
  },
})

export const validateQuery = ajv.compile<QueryBody>({
  type: 'object',
  required: ['question'],
  additionalProperties: false,
  properties: { question: text, topK, ef, filter },
})

export const validateSearch = ajv.compile<SearchBody>({
  type: 'object',
  required: ['query'],
  additionalProperties: false,
  properties: { query: text, topK, ef, threshold: { type: 'number', minimum: -1, maximum: 1 }, filter },
})

export const validateSummarize = ajv.compile<SummarizeBody>({
  type: 'object',
  required: ['topic'],
  additionalProperties: false,
  properties: { topic: text, topK, maxWords: { type: 'integer', minimum: 10, maximum: 5000 }, filter },
})

export function describeErrors(errors: ErrorObject[] | null | undefined): string {
  return (errors ?? []).map((e) => `${e.instancePath || e.schemaPath}: ${e.message}`).join('; ')
}
