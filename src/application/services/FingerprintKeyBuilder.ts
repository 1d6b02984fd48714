import { createHash } from 'crypto';
import { canonicalJson } from '../../utils/canonicalJson.js';

/**
 * Request fields that decide what the provider renders. Anything not listed
 * here (caller identity, file name, timestamps) must not change the key.
 */
export interface FingerprintInput {
  modelId: string;
  prompt: string;
  negativePrompt?: string;
  duration: number;
  aspectRatio: string;
  cfgScale?: number;
  imageSha256: string;
}

const SHA256_HEX = /^[0-9a-f]{64}$/;

/**
 * Derives the content-addressed key shared by the result cache and in-flight
 * deduplication.
 */
export class FingerprintKeyBuilder {
  build(input: FingerprintInput): string {
    if (!SHA256_HEX.test(input.imageSha256)) {
      throw new Error(`Image hash must be 64 lowercase hex characters, got "${input.imageSha256}"`);
    }

    const negativePrompt = input.negativePrompt === undefined ? '' : normalizeText(input.negativePrompt);

    const document = canonicalJson({
      model: input.modelId.trim().toLowerCase(),
      prompt: normalizeText(input.prompt),
      negative_prompt: negativePrompt === '' ? null : negativePrompt,
      duration: input.duration,
      aspect_ratio: input.aspectRatio.trim(),
      cfg_scale: input.cfgScale ?? null,
      image_sha256: input.imageSha256,
    });

    return createHash('sha256').update(document, 'utf8').digest('hex');
  }

  hashImage(bytes: Uint8Array): string {
    return createHash('sha256').update(bytes).digest('hex');
  }
}

// Prompts are case-sensitive for the provider; only whitespace is folded.
export function normalizeText(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}
