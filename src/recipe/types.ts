import type { z } from 'zod';
import type {
  BuildSpecSchema,
  PublishSpecSchema,
  RecipeSchema,
  RuntimeSpecSchema,
  SlimmingPolicySchema,
  TriggerSpecSchema,
} from '../shared/schemas.js';

export type Recipe = z.output<typeof RecipeSchema>;
export type BuildSpec = z.output<typeof BuildSpecSchema>;
export type RuntimeSpec = z.output<typeof RuntimeSpecSchema>;
export type SlimmingPolicy = z.output<typeof SlimmingPolicySchema>;
export type PublishSpec = z.output<typeof PublishSpecSchema>;
export type TriggerSpec = z.output<typeof TriggerSpecSchema>;

/** Raw recipe as written in YAML, before defaults are applied. */
export type RecipeInput = z.input<typeof RecipeSchema>;
