import {
  GenerateContentResult,
  GenerativeModel,
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  Schema,
  SchemaType,
} from '@google/generative-ai';
import { z } from 'zod';
import { UpstreamUnavailableError } from '../agents/errors';
import { AGENT_CONFIG } from '../agents/config';
import type { GenerationRequest, TextGenerator } from './types';

function isUnavailableStatus(status: number | undefined): boolean {
  return status === undefined || status === 408 || status === 429 || status >= 500;
}

export interface JsonSchemaNode {
  type?: string;
  description?: string;
  nullable?: boolean;
  properties?: Record<string, JsonSchemaNode>;
  items?: JsonSchemaNode;
  required?: string[];
}

// Unknown keywords (additionalProperties, minimum, ...) are stripped; the API rejects them.
const JsonSchemaNodeSchema: z.ZodType<JsonSchemaNode> = z.lazy(() =>
  z.object({
    type: z.string().optional(),
    description: z.string().optional(),
    nullable: z.boolean().optional(),
    properties: z.record(JsonSchemaNodeSchema).optional(),
    items: JsonSchemaNodeSchema.optional(),
    required: z.array(z.string()).optional(),
  })
);

/**
 * Maps an OpenAPI-style JSON schema onto the subset Gemini accepts as `responseSchema`.
 * Objects without properties become strings.
 */
export function toGeminiSchema(node: JsonSchemaNode): Schema {
  const base = { description: node.description, nullable: node.nullable };
  switch (node.type) {
    case 'object': {
      const entries = Object.entries(node.properties ?? {});
      if (entries.length === 0) {
        return { ...base, type: SchemaType.STRING };
      }
      const properties: Record<string, Schema> = {};
      for (const [key, value] of entries) {
        properties[key] = toGeminiSchema(value);
      }
      return { ...base, type: SchemaType.OBJECT, properties, required: node.required };
    }
    case 'array':
      return { ...base, type: SchemaType.ARRAY, items: toGeminiSchema(node.items ?? { type: 'string' }) };
    case 'number':
      return { ...base, type: SchemaType.NUMBER };
    case 'integer':
      return { ...base, type: SchemaType.INTEGER };
    case 'boolean':
      return { ...base, type: SchemaType.BOOLEAN };
    default:
      return { ...base, type: SchemaType.STRING };
  }
}

export class GeminiTextGenerator implements TextGenerator {
  private client: GenerativeModel;

  constructor(
    apiKey: string,
    readonly model: string,
    private readonly maxOutputTokens: number = AGENT_CONFIG.maxTokens
  ) {
    if (!apiKey) {
      throw new Error('GOOGLE_API_KEY environment variable is not set');
    }
    this.client = new GoogleGenerativeAI(apiKey).getGenerativeModel({ model });
  }

  async generate(request: GenerationRequest): Promise<string> {
    const parsedSchema = request.responseSchema ? JsonSchemaNodeSchema.safeParse(request.responseSchema) : null;
    const responseSchema = parsedSchema?.success ? toGeminiSchema(parsedSchema.data) : undefined;

    let result: GenerateContentResult;
    try {
      result = await this.client.generateContent(
        {
          contents: [{ role: 'user', parts: [{ text: request.prompt }] }],
          generationConfig: {
            maxOutputTokens: this.maxOutputTokens,
            temperature: 0.0,
            responseMimeType: 'application/json',
            responseSchema,
          },
        },
        { signal: request.signal }
      );
    } catch (error) {
      if (error instanceof GoogleGenerativeAIFetchError) {
        if (isUnavailableStatus(error.status)) {
          throw new UpstreamUnavailableError('gemini', error.message, error.status, { cause: error });
        }
        throw error;
      }
      if (request.signal?.aborted) {
        throw error;
      }
      // fetch rejects with a TypeError when the network is unreachable
      if (error instanceof TypeError) {
        throw new UpstreamUnavailableError('gemini', error.message, undefined, { cause: error });
      }
      throw error;
    }

    // text() throws when the candidate was blocked; the caller treats that as a failed attempt
    return result.response.text();
  }
}

export function createGeminiGenerator(model: string): GeminiTextGenerator {
  return new GeminiTextGenerator(process.env.GOOGLE_API_KEY || '', model);
}
