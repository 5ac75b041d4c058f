/**
 * Model Configuration
 *
 * Defines the language and vision models used for each task type.
 * `TEXT_MODEL` and `VISION_MODEL` override the defaults. No output
 * token cap is set: reasoning tokens count against it, and a capped
 * reasoning model can spend the whole budget before answering.
 *
 * @module config/models
 */

/**
 * Provider types
 */
export type ModelProvider = 'openai' | 'google';

/**
 * Model configuration for a specific task
 */
export interface ModelConfig {
  /** Model identifier */
  modelId: string;
  /** Provider (for routing API calls) */
  provider: ModelProvider;
  /** Temperature setting, omitted for reasoning models that reject it */
  temperature?: number;
}

/**
 * Task types that use LLM models
 */
export type TaskType = 'analysis' | 'vision';

/**
 * Default model configurations per task
 */
const DEFAULT_MODELS: Record<TaskType, ModelConfig> = {
  analysis: {
    modelId: 'o4-mini',
    provider: 'openai',
  },
  vision: {
    modelId: 'o3',
    provider: 'openai',
  },
};

/** Temperature applied to non-reasoning models */
const DEFAULT_TEMPERATURE = 0.2;

/**
 * Determine provider from model ID
 */
export function getProviderFromModelId(modelId: string): ModelProvider {
  if (modelId.startsWith('gemini-') || modelId.startsWith('models/gemini')) {
    return 'google';
  }
  // gpt-*, o1/o3/o4 and anything unknown go to OpenAI
  return 'openai';
}

/**
 * OpenAI reasoning models only accept the default temperature.
 */
function isReasoningModel(modelId: string): boolean {
  return /^o\d/.test(modelId);
}

/**
 * Resolve the configuration for a task with an optional model override.
 */
export function resolveModelConfig(task: TaskType, override?: string): ModelConfig {
  const defaultConfig = DEFAULT_MODELS[task];
  if (!override) {
    return { ...defaultConfig };
  }

  return {
    ...defaultConfig,
    modelId: override,
    provider: getProviderFromModelId(override),
    temperature: isReasoningModel(override) ? undefined : DEFAULT_TEMPERATURE,
  };
}
