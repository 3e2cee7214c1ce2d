import { readFile } from 'node:fs/promises';
import { parse } from 'yaml';
import { z } from 'zod';
import type { VoiceProfile } from './types.js';

const VoiceEntrySchema = z.object({
  speaker_id: z.number().int().positive(),
  name: z.string().trim().min(1),
  gender: z.string().trim().min(1).default('unspecified'),
  description: z.string().trim().default(''),
  sample_url: z.string().trim().min(1).optional(),
});

export interface VoiceCatalog {
  list(): VoiceProfile[];
  has(speakerId: number): boolean;
  get(speakerId: number): VoiceProfile | undefined;
}

export function createVoiceCatalog(voices: VoiceProfile[]): VoiceCatalog {
  const byId = new Map<number, VoiceProfile>();
  for (const voice of voices) {
    if (byId.has(voice.speakerId)) {
      throw new Error(`Duplicate speaker_id ${voice.speakerId} in voice catalog`);
    }
    byId.set(voice.speakerId, voice);
  }
  return {
    list: () => [...byId.values()].sort((a, b) => a.speakerId - b.speakerId),
    has: speakerId => byId.has(speakerId),
    get: speakerId => byId.get(speakerId),
  };
}

export function parseVoices(content: string, source = 'voices'): VoiceProfile[] {
  const data = parse(content);

  if (!data || typeof data !== 'object') {
    throw new Error(`Invalid voice file: ${source}`);
  }

  // Support both a top-level list and a `voices:` key
  const entries: unknown = Array.isArray(data) ? data : data.voices;

  if (!Array.isArray(entries) || entries.length === 0) {
    throw new Error(`No voices found in: ${source}`);
  }

  return entries.map((entry, i) => {
    const parsed = VoiceEntrySchema.safeParse(entry);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Voice ${i + 1} in ${source} is invalid: ${issue.path.join('.')} ${issue.message}`);
    }
    const v = parsed.data;
    return {
      speakerId: v.speaker_id,
      name: v.name,
      gender: v.gender,
      description: v.description,
      ...(v.sample_url && { sampleUrl: v.sample_url }),
    };
  });
}

export async function loadVoiceCatalog(filePath: string): Promise<VoiceCatalog> {
  const content = await readFile(filePath, 'utf-8');
  return createVoiceCatalog(parseVoices(content, filePath));
}
