import { z } from 'zod';
import { InvalidRequestError, type ValidationIssue } from './errors.js';
import type { VoiceCatalog } from './voices.js';
import type { GenerationRequest, ServiceConfig } from './types.js';

export type RequestLimits = Pick<ServiceConfig, 'maxTextLength' | 'temperatureRange' | 'topKRange' | 'defaults'>;

export type RequestValidator = (input: unknown) => GenerationRequest;

function buildSchema(limits: RequestLimits) {
  const [tMin, tMax] = limits.temperatureRange;
  const [kMin, kMax] = limits.topKRange;
  const d = limits.defaults;

  return z.object({
    text: z
      .string()
      .max(limits.maxTextLength, `Text must be at most ${limits.maxTextLength} characters`)
      .refine(text => text.trim().length > 0, 'Text cannot be empty'),
    speaker_id: z.number().int().min(1).default(d.speakerId),
    temperature: z.number().min(tMin).max(tMax).default(d.temperature),
    top_k: z.number().int().min(kMin).max(kMax).default(d.topK),
    style: z.string().trim().min(1).max(64).default(d.style),
    device: z.enum(['auto', 'cuda', 'cpu']).default(d.device),
  });
}

/**
 * Validates a raw `POST /api/generate` body against the configured ranges and
 * the voice catalog. Throws InvalidRequestError; returns a frozen request.
 * The configured default speaker must exist in the catalog.
 */
export function createRequestValidator(limits: RequestLimits, voices: VoiceCatalog): RequestValidator {
  const { speakerId } = limits.defaults;
  if (!voices.has(speakerId)) {
    throw new Error(`Invalid configuration: DEFAULT_SPEAKER_ID (${speakerId}) is not in the voice catalog`);
  }
  const schema = buildSchema(limits);

  return (input: unknown): GenerationRequest => {
    const parsed = schema.safeParse(input ?? {});
    if (!parsed.success) {
      const issues: ValidationIssue[] = parsed.error.issues.map(issue => ({
        path: issue.path.join('.'),
        message: issue.message,
      }));
      throw new InvalidRequestError(issues);
    }

    const body = parsed.data;
    if (!voices.has(body.speaker_id)) {
      throw new InvalidRequestError([{ path: 'speaker_id', message: `Unknown speaker ${body.speaker_id}` }]);
    }

    return Object.freeze({
      text: body.text,
      speakerId: body.speaker_id,
      temperature: body.temperature,
      topK: body.top_k,
      style: body.style,
      device: body.device,
    });
  };
}
