import * as Joi from 'joi';

export const envValidationSchema = Joi.object({
  // Server configuration
  NODE_ENV: Joi.string()
    .valid('development', 'production', 'test')
    .default('development'),
  PORT: Joi.number().default(4000),

  // Analysis engine configuration
  AI_ANALYSIS_ENABLED: Joi.boolean().default(true),
  AI_ANALYSIS_FALLBACK_ENABLED: Joi.boolean().default(true),
  AI_ANALYSIS_MAX_RETRIES: Joi.number().integer().min(1).default(3),
  AI_ANALYSIS_RETRY_DELAY_MS: Joi.number().integer().min(0).default(2000),
  AI_ANALYSIS_SYSTEM_PROMPT: Joi.string().optional(),

  // OpenRouter (OpenAI-compatible) inference configuration
  OPENROUTER_API_URL: Joi.string()
    .uri()
    .default('https://openrouter.ai/api/v1/chat/completions'),
  OPENROUTER_API_KEY: Joi.string().allow('').optional(),
  OPENROUTER_MODEL: Joi.string().default('openai/gpt-4o-mini'),
  OPENROUTER_MAX_TOKENS: Joi.number().integer().min(1).default(2000),
  OPENROUTER_TEMPERATURE: Joi.number().min(0).max(2).default(0.3),
  OPENROUTER_TIMEOUT_MS: Joi.number().integer().min(1).default(30000),
  OPENROUTER_RATE_LIMIT_DELAY_MS: Joi.number().integer().min(0).default(1000),
  OPENROUTER_HTTP_REFERER: Joi.string().uri().optional(),
  OPENROUTER_APP_TITLE: Joi.string().default('Prescription Safety Service'),
});
