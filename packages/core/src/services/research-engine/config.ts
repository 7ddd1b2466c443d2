/**
 * Research Configuration System
 *
 * Loads and manages configuration from research-config.yaml
 * Provides strongly typed access to all configurable settings.
 */

import * as fs from "fs";
import * as path from "path";
import * as yaml from "js-yaml";
import { z } from "zod";
import type { ModelConfig } from "../../interfaces/completion-provider";
import { createLogger } from "../../utils/logger";

const log = createLogger("config");

// =============================================================================
// Type Definitions
// =============================================================================

export type { ModelConfig } from "../../interfaces/completion-provider";

/**
 * Pipeline steps that call the completion provider
 */
export type ModelStep = "optimize" | "clarify" | "plan" | "summarize" | "write";

/**
 * LLM provider configuration
 */
export interface LLMConfig {
  provider: "openai";
  models: Record<ModelStep, ModelConfig>;
}

/**
 * Search provider configuration
 */
export interface SearchConfig {
  provider: "brave";
  resultsPerTerm: number;
  safeSearch: "off" | "moderate" | "strict";
  country?: string;
  language?: string;
  includeDomains?: string[]; // restrict every search to these sites
  excludeDomains?: string[];
}

/**
 * Research pipeline configuration
 */
export interface ResearchPipelineConfig {
  questionCount: number; // N clarifying questions per run
  planSize: number; // M planned searches per run
  stageMaxAttempts: number; // attempts per required model stage
  retryBaseDelayMs: number;
  maxRetainedRuns: number; // finished runs kept for inspection
  maxSuspendedRuns: number; // runs waiting for answers at once; the oldest is cancelled
}

/**
 * Report delivery configuration
 */
export interface DeliveryConfig {
  subjectPrefix: string;
  from?: string;
  to?: string;
}

/**
 * Complete research configuration
 */
export interface ResearchConfig {
  llm: LLMConfig;
  search: SearchConfig;
  research: ResearchPipelineConfig;
  delivery: DeliveryConfig;
}

// =============================================================================
// Validation
// =============================================================================

const modelOverrideSchema = z
  .object({
    model: z.string().min(1),
    temperature: z.number().min(0).max(2),
  })
  .partial()
  .strict();

/**
 * Shape of research-config.yaml and of runtime overrides: every field optional
 */
export const configOverridesSchema = z
  .object({
    llm: z
      .object({
        provider: z.literal("openai"),
        models: z
          .object({
            optimize: modelOverrideSchema,
            clarify: modelOverrideSchema,
            plan: modelOverrideSchema,
            summarize: modelOverrideSchema,
            write: modelOverrideSchema,
          })
          .partial()
          .strict(),
      })
      .partial()
      .strict(),
    search: z
      .object({
        provider: z.literal("brave"),
        resultsPerTerm: z.number().int().min(1).max(20),
        safeSearch: z.enum(["off", "moderate", "strict"]),
        country: z.string().length(2),
        language: z.string().min(2),
        includeDomains: z.array(z.string().min(1)),
        excludeDomains: z.array(z.string().min(1)),
      })
      .partial()
      .strict(),
    research: z
      .object({
        questionCount: z.number().int().min(1).max(10),
        planSize: z.number().int().min(1).max(20),
        stageMaxAttempts: z.number().int().min(1).max(5),
        retryBaseDelayMs: z.number().int().min(0),
        maxRetainedRuns: z.number().int().min(1),
        maxSuspendedRuns: z.number().int().min(1),
      })
      .partial()
      .strict(),
    delivery: z
      .object({
        subjectPrefix: z.string(),
        from: z.string().min(1),
        to: z.string().min(1),
      })
      .partial()
      .strict(),
  })
  .partial()
  .strict();

export type ConfigOverrides = z.infer<typeof configOverridesSchema>;

// =============================================================================
// Default Configuration
// =============================================================================

/**
 * Default configuration values (used when config file is not found)
 */
export const DEFAULT_CONFIG: ResearchConfig = {
  llm: {
    provider: "openai",
    models: {
      optimize: { model: "gpt-4o-mini", temperature: 0.3 },
      clarify: { model: "gpt-4o-mini", temperature: 0.7 },
      plan: { model: "gpt-4o-mini", temperature: 0.5 },
      summarize: { model: "gpt-4o-mini", temperature: 0.2 },
      write: { model: "gpt-4o-mini", temperature: 0.3 },
    },
  },
  search: {
    provider: "brave",
    resultsPerTerm: 5,
    safeSearch: "moderate",
  },
  research: {
    questionCount: 3,
    planSize: 5,
    stageMaxAttempts: 2,
    retryBaseDelayMs: 1000,
    maxRetainedRuns: 100,
    maxSuspendedRuns: 50,
  },
  delivery: {
    subjectPrefix: "Research Report",
  },
};

// =============================================================================
// Merging
// =============================================================================

function mergeModels(
  base: LLMConfig["models"],
  overrides: NonNullable<ConfigOverrides["llm"]>["models"]
): LLMConfig["models"] {
  return {
    optimize: { ...base.optimize, ...overrides?.optimize },
    clarify: { ...base.clarify, ...overrides?.clarify },
    plan: { ...base.plan, ...overrides?.plan },
    summarize: { ...base.summarize, ...overrides?.summarize },
    write: { ...base.write, ...overrides?.write },
  };
}

/**
 * Merge overrides over a complete configuration, section by section
 */
export function mergeConfig(
  base: ResearchConfig,
  overrides: ConfigOverrides
): ResearchConfig {
  return {
    llm: {
      provider: overrides.llm?.provider ?? base.llm.provider,
      models: mergeModels(base.llm.models, overrides.llm?.models),
    },
    search: { ...base.search, ...overrides.search },
    research: { ...base.research, ...overrides.research },
    delivery: { ...base.delivery, ...overrides.delivery },
  };
}

// =============================================================================
// Configuration Loader
// =============================================================================

const CONFIG_FILENAME = "research-config.yaml";

let cachedConfig: ResearchConfig | null = null;
let configPath: string | null = null;

/**
 * Find the research-config.yaml file by searching upward from a starting directory
 */
function findConfigFile(startDir?: string): string | null {
  let currentDir = startDir || process.cwd();

  // Search up to 10 levels up
  for (let i = 0; i < 10; i++) {
    const configFilePath = path.join(currentDir, CONFIG_FILENAME);
    if (fs.existsSync(configFilePath)) {
      return configFilePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      // Reached root
      break;
    }
    currentDir = parentDir;
  }

  return null;
}

/**
 * Parse and validate the contents of a config file
 */
export function parseConfig(contents: string): ResearchConfig {
  const raw: unknown = yaml.load(contents) ?? {};
  const parsed = configOverridesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid research configuration: ${parsed.error.message}`);
  }
  return mergeConfig(DEFAULT_CONFIG, parsed.data);
}

/**
 * Load configuration from YAML file
 *
 * A missing file falls back to the defaults; an unreadable or invalid file
 * throws, since running with a half-applied configuration hides mistakes.
 */
export function loadConfig(customPath?: string): ResearchConfig {
  // Return cached config if available and no custom path specified
  if (cachedConfig && !customPath) {
    return cachedConfig;
  }

  const filePath = customPath || findConfigFile();

  if (!filePath) {
    log.warn(`${CONFIG_FILENAME} not found, using default configuration`);
    cachedConfig = DEFAULT_CONFIG;
    return DEFAULT_CONFIG;
  }

  const config = parseConfig(fs.readFileSync(filePath, "utf8"));

  cachedConfig = config;
  configPath = filePath;

  log.info({ path: filePath }, "Loaded research config");
  return config;
}

/**
 * Get the currently loaded configuration
 * Loads from file if not yet loaded
 */
export function getConfig(): ResearchConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear the cached configuration (useful for testing or reloading)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
  configPath = null;
}

/**
 * Get the path to the loaded config file
 */
export function getConfigPath(): string | null {
  return configPath;
}

/**
 * Override specific configuration values at runtime
 * Useful for testing or per-request customization
 */
export function withConfigOverrides(overrides: ConfigOverrides): ResearchConfig {
  return mergeConfig(getConfig(), overrides);
}

/**
 * Get model configuration for a specific step
 */
export function getModelConfig(
  step: ModelStep,
  config: ResearchConfig = getConfig()
): ModelConfig {
  return config.llm.models[step];
}
