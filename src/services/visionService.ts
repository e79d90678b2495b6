/**
 * Vision Service
 * Sends before/after imagery to a vision model and returns its raw,
 * unvalidated assessment together with usage for cost accounting.
 * Location: src/services/visionService.ts
 */

import axios, { AxiosAdapter, AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { ANTHROPIC_API_BASE } from '../config';
import type { ChangeType, ImageryArtifact, Location, TimeWindow } from '../types/satellite';
import { AnalysisCancelledError, VisionCallError } from './errors';
import { buildComparisonPrompt } from './prompts';

const ANTHROPIC_VERSION = '2023-06-01';
const SUPPORTED_MEDIA_TYPES = ['image/png', 'image/jpeg', 'image/gif', 'image/webp'] as const;

// ============================================================================
// CAPABILITY
// ============================================================================

export interface VisionInput {
  before: ImageryArtifact;
  after: ImageryArtifact;
  location: Location;
  timeWindow: TimeWindow;
  analysisType: ChangeType;
}

export interface VisionResult {
  // Untrusted; goes through parseAssessment before anything reads it
  raw: unknown;
  usage: { inputUnits: number; outputUnits: number };
  callId: string;
  model: string;
}

export interface VisionCapability {
  compare(input: VisionInput, signal?: AbortSignal): Promise<VisionResult>;
}

// ============================================================================
// ANTHROPIC CLIENT
// ============================================================================

const MediaTypeSchema = z.enum(SUPPORTED_MEDIA_TYPES);

const MessageResponseSchema = z.object({
  id: z.string(),
  model: z.string(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
  usage: z.object({
    input_tokens: z.number().int().nonnegative(),
    output_tokens: z.number().int().nonnegative(),
  }),
});

export interface AnthropicVisionOptions {
  apiKey?: string;
  baseURL?: string;
  model?: string;
  maxTokens?: number;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

function imageBlock(artifact: ImageryArtifact) {
  const mediaType = MediaTypeSchema.safeParse(artifact.provenance.contentType);
  if (!mediaType.success) {
    throw new VisionCallError(`Unsupported image type for vision: ${artifact.provenance.contentType}`);
  }
  return {
    type: 'image',
    source: {
      type: 'base64',
      media_type: mediaType.data,
      data: artifact.payload.toString('base64'),
    },
  };
}

function describeApiError(error: AxiosError): string {
  const body = error.response?.data;
  if (body && typeof body === 'object' && 'error' in body) {
    const detail = body.error;
    if (detail && typeof detail === 'object' && 'message' in detail && typeof detail.message === 'string') {
      return detail.message;
    }
  }
  return error.message;
}

export class AnthropicVisionClient implements VisionCapability {
  private client: AxiosInstance;
  private readonly model: string;
  private readonly maxTokens: number;

  constructor(options: AnthropicVisionOptions = {}) {
    if (!options.apiKey) {
      throw new VisionCallError('CLAUDE_API_KEY is not set');
    }
    this.model = options.model ?? 'claude-sonnet-4-20250514';
    this.maxTokens = options.maxTokens ?? 4000;

    this.client = axios.create({
      baseURL: options.baseURL ?? ANTHROPIC_API_BASE,
      timeout: options.timeoutMs ?? 120000,
      headers: {
        'Content-Type': 'application/json',
        'x-api-key': options.apiKey,
        'anthropic-version': ANTHROPIC_VERSION,
      },
      ...(options.adapter ? { adapter: options.adapter } : {}),
    });

    this.client.interceptors.request.use(
      (config) => {
        console.log(`[Vision] ${config.method?.toUpperCase()} ${config.url} (${this.model})`);
        return config;
      },
      (error) => Promise.reject(error)
    );

    this.client.interceptors.response.use(
      (response) => response,
      (error: AxiosError) => {
        if (!axios.isCancel(error)) {
          console.error('[Vision Error]', error.response?.status ?? error.code ?? '', describeApiError(error));
        }
        return Promise.reject(error);
      }
    );
  }

  /**
   * Ask the model to compare the two images
   */
  async compare(input: VisionInput, signal?: AbortSignal): Promise<VisionResult> {
    if (signal?.aborted) throw new AnalysisCancelledError();

    const prompt = buildComparisonPrompt({
      location: input.location,
      timeWindow: input.timeWindow,
      analysisType: input.analysisType,
      servedDates: {
        before: input.before.provenance.servedDate,
        after: input.after.provenance.servedDate,
      },
    });

    const body = {
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [
        {
          role: 'user',
          content: [imageBlock(input.before), imageBlock(input.after), { type: 'text', text: prompt }],
        },
      ],
    };

    let data: unknown;
    try {
      const response = await this.client.post<unknown>('/messages', body, { signal });
      data = response.data;
    } catch (error) {
      if (signal?.aborted || axios.isCancel(error)) {
        throw new AnalysisCancelledError();
      }
      if (axios.isAxiosError(error)) {
        const status = error.response?.status;
        throw new VisionCallError(
          `Vision request failed${status ? ` (HTTP ${status})` : ''}: ${describeApiError(error)}`,
          { cause: error }
        );
      }
      throw error;
    }

    const parsed = MessageResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new VisionCallError(`Unexpected vision response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }

    const message = parsed.data;
    const text = message.content
      .filter((block) => block.type === 'text')
      .map((block) => block.text ?? '')
      .join('\n');

    console.log(
      `[Vision] ✅ ${message.id}: ${message.usage.input_tokens} in / ${message.usage.output_tokens} out tokens`
    );

    return {
      raw: text,
      usage: {
        inputUnits: message.usage.input_tokens,
        outputUnits: message.usage.output_tokens,
      },
      callId: message.id,
      model: message.model,
    };
  }
}
