/**
 * Zod schemas for user-facing configuration (config.json) and for the
 * options the group chat validates at construction.
 *
 * Validates what users write in `~/.config/convene/config.json` or
 * `.convene/config.json`.
 */

import { z } from 'zod';

// =============================================================================
// MODEL SETTINGS
// =============================================================================

const generation = {
  temperature: z.number().min(0).max(2).optional(),
  maxTokens: z.number().int().positive().optional(),
};

/**
 * A provider tag plus its connection settings. Unset credentials fall back
 * to the provider's environment variables when the provider is created.
 */
export const ModelSettingsSchema = z.discriminatedUnion('type', [
  z
    .object({
      type: z.literal('azure'),
      apiKey: z.string().optional(),
      endpoint: z.string().url().optional(),
      deployment: z.string().min(1).optional(),
      apiVersion: z.string().optional(),
      ...generation,
    })
    .strict(),
  z
    .object({
      type: z.literal('openai'),
      apiKey: z.string().optional(),
      model: z.string().optional(),
      organization: z.string().optional(),
      baseUrl: z.string().url().optional(),
      ...generation,
    })
    .strict(),
  z
    .object({
      type: z.literal('anthropic'),
      apiKey: z.string().optional(),
      model: z.string().optional(),
      baseUrl: z.string().url().optional(),
      ...generation,
    })
    .strict(),
  z
    .object({
      type: z.literal('mock'),
      responses: z.array(z.string()).optional(),
      latencyMs: z.number().int().nonnegative().optional(),
      ...generation,
    })
    .strict(),
]);

// =============================================================================
// CHAT AND PARTICIPANTS
// =============================================================================

export const ChatConfigSchema = z
  .object({
    name: z.string().min(1),
    description: z.string().default(''),
    maxTurns: z.number().int().positive().default(10),
    terminationKeyword: z.string().default('TERMINATE'),
    enableTerminationKeyword: z.boolean().default(true),
    /** Milliseconds */
    responseWaitTime: z.number().int().nonnegative().default(500),
    autoSelectSpeaker: z.boolean().default(true),
  })
  .strict();

export const ParticipantRoleSchema = z.enum(['facilitator', 'participant', 'observer']);

export const ParticipantOptionsSchema = z
  .object({
    role: ParticipantRoleSchema.default('participant'),
    priority: z.number().int().default(1),
    maxConsecutiveTurns: z.number().int().positive().default(3),
  })
  .strict();

export const ParticipantEntrySchema = ParticipantOptionsSchema.extend({
  name: z.string().min(1),
});

/** Hint domain → trigger words */
export const SpeakerHintsSchema = z.record(z.string().min(1), z.array(z.string().min(1)));

export const SummarizerOptionsSchema = z
  .object({
    maxMessages: z.number().int().positive().default(120),
    charBudget: z.number().int().positive().default(6000),
  })
  .strict();

// =============================================================================
// AGENT DEFINITIONS
// =============================================================================

export const AgentDefinitionSchema = z
  .object({
    name: z
      .string()
      .min(1)
      .regex(/^[\w.-]+$/, 'agent names may contain letters, digits, "_", "-" and "." only'),
    instructions: z.string().min(1),
    enabled: z.boolean().default(true),
    /** Defaults to the provider detected from the environment */
    model: ModelSettingsSchema.optional(),
  })
  .strict();

// =============================================================================
// USER CONFIG
// =============================================================================

export const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']);

/**
 * Uses `.passthrough()` at the top level so unknown keys do not fail
 * validation.
 */
export const UserConfigSchema = z
  .object({
    chat: ChatConfigSchema.partial().optional(),
    participants: z.array(ParticipantEntrySchema).optional(),
    agents: z.array(AgentDefinitionSchema).optional(),
    routing: ModelSettingsSchema.optional(),
    summary: ModelSettingsSchema.optional(),
    speakerHints: SpeakerHintsSchema.optional(),
    missingAgentPolicy: z.enum(['skip', 'abort']).optional(),
    summarizer: SummarizerOptionsSchema.partial().optional(),
    logging: z
      .object({
        level: LogLevelSchema.optional(),
        file: z.string().optional(),
      })
      .strict()
      .optional(),
    persistence: z
      .object({
        dbPath: z.string().optional(),
        idleTimeoutMs: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
  })
  .passthrough();

export type ModelSettingsInput = z.infer<typeof ModelSettingsSchema>;
export type ChatConfigInput = z.input<typeof ChatConfigSchema>;
export type ParticipantOptionsInput = z.input<typeof ParticipantOptionsSchema>;
export type SummarizerOptionsInput = z.input<typeof SummarizerOptionsSchema>;
export type SummarizerOptions = z.infer<typeof SummarizerOptionsSchema>;
export type AgentDefinition = z.infer<typeof AgentDefinitionSchema>;
export type AgentDefinitionInput = z.input<typeof AgentDefinitionSchema>;
export type SpeakerHints = z.infer<typeof SpeakerHintsSchema>;
export type ValidatedUserConfig = z.infer<typeof UserConfigSchema>;
