import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    environment: string;

    // Telegram
    telegramBotToken: string;
    telegramWebhookSecret: string;
    telegramApiBaseUrl: string;

    // Leonardo (prompt enhancement + image generation)
    leonardoApiKey: string;
    leonardoBaseUrl: string;
    leonardoModelId: string;
    leonardoReferenceModelId: string;
    imageWidth: number;
    imageHeight: number;

    // Upstream call behaviour
    upstreamTimeoutMs: number;
    upstreamMaxRetries: number;
    retryBackoffMs: number;
    generationPollIntervalMs: number;
    generationMaxPolls: number;

    // Input limits
    maxPromptLength: number;
    maxReferenceImageBytes: number;

    // Sessions
    sessionTtlSeconds: number;
    sessionSweepIntervalSeconds: number;
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

/**
 * Loads configuration from environment variables.
 * Secrets default to empty so validateConfig can report every missing one at once.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 3000),
        environment: getEnvVar('NODE_ENV', 'development'),

        // Telegram
        telegramBotToken: getEnvVar('TELEGRAM_BOT_TOKEN', ''),
        telegramWebhookSecret: getEnvVar('TELEGRAM_WEBHOOK_SECRET', ''),
        telegramApiBaseUrl: getEnvVar('TELEGRAM_API_BASE_URL', 'https://api.telegram.org'),

        // Leonardo
        leonardoApiKey: getEnvVar('LEONARDO_API_KEY', ''),
        leonardoBaseUrl: getEnvVar('LEONARDO_BASE_URL', 'https://cloud.leonardo.ai/api/rest/v1'),
        leonardoModelId: getEnvVar('LEONARDO_MODEL_ID', '6b645e3a-d64f-4341-a6d8-7a3690fbf042'),
        leonardoReferenceModelId: getEnvVar('LEONARDO_REFERENCE_MODEL_ID', 'e71a1c2f-4f80-4800-934f-2c68979d8cc8'),
        imageWidth: getEnvVarNumber('IMAGE_WIDTH', 1040),
        imageHeight: getEnvVarNumber('IMAGE_HEIGHT', 512),

        // Upstream call behaviour
        upstreamTimeoutMs: getEnvVarNumber('UPSTREAM_TIMEOUT_MS', 30000),
        upstreamMaxRetries: getEnvVarNumber('UPSTREAM_MAX_RETRIES', 1),
        retryBackoffMs: getEnvVarNumber('RETRY_BACKOFF_MS', 1000),
        generationPollIntervalMs: getEnvVarNumber('GENERATION_POLL_INTERVAL_MS', 2000),
        generationMaxPolls: getEnvVarNumber('GENERATION_MAX_POLLS', 30),

        // Input limits
        maxPromptLength: getEnvVarNumber('MAX_PROMPT_LENGTH', 200),
        maxReferenceImageBytes: getEnvVarNumber('MAX_REFERENCE_IMAGE_BYTES', 10 * 1024 * 1024),

        // Sessions
        sessionTtlSeconds: getEnvVarNumber('SESSION_TTL_SECONDS', 3600),
        sessionSweepIntervalSeconds: getEnvVarNumber('SESSION_SWEEP_INTERVAL_SECONDS', 300),
    };
}

/**
 * Validates that the required secrets and limits are usable.
 * Any error here is fatal at startup.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!config.telegramBotToken) {
        errors.push('TELEGRAM_BOT_TOKEN is required to talk to Telegram');
    }
    if (!config.leonardoApiKey) {
        errors.push('LEONARDO_API_KEY is required for prompt enhancement and image generation');
    }
    if (config.upstreamMaxRetries < 0) {
        errors.push('UPSTREAM_MAX_RETRIES must not be negative');
    }
    if (config.maxPromptLength <= 0) {
        errors.push('MAX_PROMPT_LENGTH must be positive');
    }
    if (config.maxReferenceImageBytes <= 0) {
        errors.push('MAX_REFERENCE_IMAGE_BYTES must be positive');
    }
    if (config.generationMaxPolls < 1) {
        errors.push('GENERATION_MAX_POLLS must be at least 1');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
