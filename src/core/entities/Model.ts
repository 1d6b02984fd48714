/**
 * Supported video models. The set is closed: anything else is rejected at
 * admission instead of being passed through to the provider.
 */
export const MODEL_IDS = [
  'kling_21_standard',
  'kling_21_pro',
  'kling_21_master',
  'kling_20_master',
  'kling_16_pro',
  'luma_dream',
  'haiper_20',
] as const;

export type ModelId = (typeof MODEL_IDS)[number];

export interface VideoModel {
  id: ModelId;
  name: string;
  endpoint: string;
  durations: readonly number[];
  maxDuration: number;
  costPerSecond: number;
  tier: string;
}

export const ASPECT_RATIOS = ['16:9', '9:16', '1:1', '4:3', '3:4', '21:9', '9:21', '2:3', '3:2'] as const;

export type AspectRatio = (typeof ASPECT_RATIOS)[number];

export const MODEL_CATALOG: Readonly<Record<ModelId, VideoModel>> = {
  kling_21_standard: {
    id: 'kling_21_standard',
    name: 'Kling 2.1 Standard',
    endpoint: 'fal-ai/kling-video/v2.1/standard/image-to-video',
    durations: [5, 10],
    maxDuration: 10,
    costPerSecond: 0.05,
    tier: 'Standard',
  },
  kling_21_pro: {
    id: 'kling_21_pro',
    name: 'Kling 2.1 Pro',
    endpoint: 'fal-ai/kling-video/v2.1/pro/image-to-video',
    durations: [5, 10],
    maxDuration: 10,
    costPerSecond: 0.09,
    tier: 'Professional',
  },
  kling_21_master: {
    id: 'kling_21_master',
    name: 'Kling 2.1 Master',
    endpoint: 'fal-ai/kling-video/v2.1/master/image-to-video',
    durations: [5, 10],
    maxDuration: 10,
    costPerSecond: 0.14,
    tier: 'Premium',
  },
  kling_20_master: {
    id: 'kling_20_master',
    name: 'Kling 2.0 Master',
    endpoint: 'fal-ai/kling-video/v2/master/image-to-video',
    durations: [5, 10],
    maxDuration: 10,
    costPerSecond: 0.28,
    tier: 'Legacy Premium',
  },
  kling_16_pro: {
    id: 'kling_16_pro',
    name: 'Kling 1.6 Pro',
    endpoint: 'fal-ai/kling-video/v1.6/pro/image-to-video',
    durations: [5, 10],
    maxDuration: 10,
    costPerSecond: 0.095,
    tier: 'Legacy',
  },
  luma_dream: {
    id: 'luma_dream',
    name: 'Luma Dream Machine',
    endpoint: 'fal-ai/luma-dream-machine',
    durations: [5, 9],
    maxDuration: 9,
    costPerSecond: 0.1,
    tier: 'Alternative',
  },
  haiper_20: {
    id: 'haiper_20',
    name: 'Haiper 2.0',
    endpoint: 'fal-ai/haiper-video-v2/image-to-video',
    durations: [5, 10],
    maxDuration: 10,
    costPerSecond: 0.04,
    tier: 'Budget',
  },
};

/**
 * Estimated provider charge in USD, rounded to the cent.
 */
export function estimateCost(modelId: ModelId, duration: number): number {
  const model = MODEL_CATALOG[modelId];
  const billed = Math.min(duration, model.maxDuration);
  return Math.round(billed * model.costPerSecond * 100) / 100;
}
