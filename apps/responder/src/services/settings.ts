import { z } from 'zod';
import type { AppConfig } from '../lib/env.js';

export type RuntimeSettings = {
  model: string;
  systemPrompt: string;
  autoGenerate: boolean;
  displayThreshold: number;
  autoResponseThreshold: number;
  relayUrl: string | null;
  temperature: number;
  topP: number;
  topK: number;
};

const percent = z.number().min(0).max(100);

export const settingsPatchSchema = z
  .object({
    model: z.string().trim(),
    systemPrompt: z.string(),
    autoGenerate: z.boolean(),
    displayThreshold: percent,
    autoResponseThreshold: percent,
    relayUrl: z.string().url().nullable(),
    temperature: z.number().min(0).max(2),
    topP: z.number().min(0).max(1),
    topK: z.number().int().min(1)
  })
  .partial()
  .strict();

export type SettingsPatch = z.infer<typeof settingsPatchSchema>;

export function settingsFromConfig(config: AppConfig): RuntimeSettings {
  return {
    model: config.model,
    systemPrompt: config.systemPrompt,
    autoGenerate: config.autoGenerate,
    displayThreshold: config.displayThreshold,
    autoResponseThreshold: config.autoResponseThreshold,
    relayUrl: config.relayUrl ?? null,
    temperature: config.temperature,
    topP: config.topP,
    topK: config.topK
  };
}

/**
 * Operator-tunable settings, seeded from the environment. Components read
 * through get() on every use so changes apply to the next message.
 */
export class SettingsStore {
  private current: RuntimeSettings;

  constructor(initial: RuntimeSettings) {
    this.current = { ...initial };
  }

  get(): Readonly<RuntimeSettings> {
    return this.current;
  }

  update(patch: SettingsPatch): Readonly<RuntimeSettings> {
    const next: RuntimeSettings = { ...this.current };
    for (const [key, value] of Object.entries(patch)) {
      if (value !== undefined) Object.assign(next, { [key]: value });
    }
    if (next.autoResponseThreshold < next.displayThreshold) {
      throw new z.ZodError([
        {
          code: z.ZodIssueCode.custom,
          path: ['autoResponseThreshold'],
          message: 'autoResponseThreshold must not be lower than displayThreshold'
        }
      ]);
    }
    this.current = next;
    return this.current;
  }
}
