/**
 * Configuration management for the research loop
 *
 * The configuration is read once from the environment and frozen. Every
 * stage receives the same object by reference and none of them may write to it.
 */

import { readFile, writeFile } from 'fs/promises';
import path from 'path';
import type { DistinctQuestion } from 'inquirer';
import { ConfigError } from './errors.js';
import { EnvReader } from './utils/env.js';

export const SEARCH_PROVIDERS = ['tavily', 'perplexity', 'youtube'] as const;
export type SearchProvider = (typeof SEARCH_PROVIDERS)[number];

export const UI_MODES = ['minimal', 'fancy', 'plain'] as const;
export type UiMode = (typeof UI_MODES)[number];

export const SEARCH_FAILURE_POLICIES = ['skip', 'fail'] as const;
export type SearchFailurePolicy = (typeof SEARCH_FAILURE_POLICIES)[number];

/**
 * Centralized default values.
 * Use these instead of hardcoding defaults throughout the codebase.
 */
export const DEFAULTS = {
    llmBaseUrl: 'https://openrouter.ai/api/v1',
    llmModel: 'openai/gpt-4o-mini',
    llmTemperature: 0,
    llmTimeoutMs: 120_000,
    searchProvider: 'tavily' as SearchProvider,
    searchMaxResults: 3,
    searchTimeoutMs: 30_000,
    maxTokensPerSource: 1000,
    fetchFullPage: true,
    searchFailurePolicy: 'skip' as SearchFailurePolicy,
    maxLoops: 3,
    httpRetries: 3,
    httpRetryDelayMs: 1000,
    emailEnabled: true,
    emailFallbackSender: 'no-reply@example.com',
    smtpServer: 'smtp.gmail.com',
    smtpPort: 587,
    host: '127.0.0.1',
    port: 2024,
    uiMode: 'fancy' as UiMode,
} as const;

export interface LlmConfig {
    readonly baseUrl: string;
    readonly apiKey: string;
    readonly model: string;
    readonly temperature: number;
    readonly timeoutMs: number;
}

export interface SearchConfig {
    readonly provider: SearchProvider;
    readonly tavilyApiKey: string;
    readonly perplexityApiKey: string;
    readonly youtubeApiKey: string;
    /** Append YouTube results after the web provider's results */
    readonly includeYoutube: boolean;
    readonly maxResults: number;
    readonly maxTokensPerSource: number;
    readonly fetchFullPage: boolean;
    readonly timeoutMs: number;
    readonly failurePolicy: SearchFailurePolicy;
}

export interface SmtpConfig {
    readonly host: string;
    readonly port: number;
    readonly secure: boolean;
    readonly username: string;
    readonly password: string;
}

export interface EmailConfig {
    readonly enabled: boolean;
    readonly recipient: string;
    readonly from: string;
    readonly smtp: SmtpConfig;
}

export interface HttpConfig {
    readonly retries: number;
    readonly retryDelayMs: number;
}

export interface Config {
    readonly llm: LlmConfig;
    readonly search: SearchConfig;
    readonly research: { readonly maxLoops: number };
    readonly email: EmailConfig;
    readonly http: HttpConfig;
    readonly server: { readonly host: string; readonly port: number };
    readonly uiMode: UiMode;
}

/**
 * Values a single invocation (CLI flag, HTTP request) may change.
 * They produce a new frozen config; the original is never touched.
 */
export interface ConfigOverrides {
    provider?: SearchProvider;
    maxLoops?: number;
    model?: string;
    emailEnabled?: boolean;
    host?: string;
    port?: number;
    uiMode?: UiMode;
}

function deepFreeze<T extends object>(value: T): T {
    for (const key of Object.keys(value)) {
        const child: unknown = Reflect.get(value, key);
        if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}

const PORT_RANGE = { min: 1, max: 65535 };

/**
 * Read the configuration from the environment.
 *
 * Throws a ConfigError listing every value that is set but unusable, so a
 * typo never silently turns into a default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const read = new EnvReader(env);
    const smtpUsername = read.string('SMTP_USERNAME');

    const config: Config = {
        llm: {
            baseUrl: read.string('LLM_BASE_URL', DEFAULTS.llmBaseUrl).replace(/\/+$/, ''),
            apiKey: read.string('LLM_API_KEY'),
            model: read.string('LLM_MODEL', DEFAULTS.llmModel),
            temperature: read.number('LLM_TEMPERATURE', DEFAULTS.llmTemperature, { min: 0, max: 2 }),
            timeoutMs: read.int('LLM_TIMEOUT_MS', DEFAULTS.llmTimeoutMs, { min: 1 }),
        },
        search: {
            provider: read.choice('SEARCH_API', SEARCH_PROVIDERS, DEFAULTS.searchProvider),
            tavilyApiKey: read.string('TAVILY_API_KEY'),
            perplexityApiKey: read.string('PERPLEXITY_API_KEY'),
            youtubeApiKey: read.string('YOUTUBE_API_KEY'),
            includeYoutube: read.bool('INCLUDE_YOUTUBE', false),
            maxResults: read.int('SEARCH_MAX_RESULTS', DEFAULTS.searchMaxResults, { min: 1 }),
            maxTokensPerSource: read.int('MAX_TOKENS_PER_SOURCE', DEFAULTS.maxTokensPerSource, { min: 1 }),
            fetchFullPage: read.bool('FETCH_FULL_PAGE', DEFAULTS.fetchFullPage),
            timeoutMs: read.int('SEARCH_TIMEOUT_MS', DEFAULTS.searchTimeoutMs, { min: 1 }),
            failurePolicy: read.choice('SEARCH_FAILURE_POLICY', SEARCH_FAILURE_POLICIES, DEFAULTS.searchFailurePolicy),
        },
        research: {
            maxLoops: read.int('MAX_WEB_RESEARCH_LOOPS', DEFAULTS.maxLoops, { min: 1 }),
        },
        email: {
            enabled: read.bool('EMAIL_ENABLED', DEFAULTS.emailEnabled),
            recipient: read.string('EMAIL_RECIPIENT'),
            from: read.string('EMAIL_FROM', smtpUsername || DEFAULTS.emailFallbackSender),
            smtp: {
                host: read.string('SMTP_SERVER', DEFAULTS.smtpServer),
                port: read.int('SMTP_PORT', DEFAULTS.smtpPort, PORT_RANGE),
                secure: read.bool('SMTP_SECURE', false),
                username: smtpUsername,
                password: read.string('SMTP_PASSWORD'),
            },
        },
        http: {
            retries: read.int('HTTP_RETRIES', DEFAULTS.httpRetries, { min: 1 }),
            retryDelayMs: read.int('HTTP_RETRY_DELAY_MS', DEFAULTS.httpRetryDelayMs, { min: 0 }),
        },
        server: {
            host: read.string('HOST', DEFAULTS.host),
            port: read.int('PORT', DEFAULTS.port, PORT_RANGE),
        },
        uiMode: read.choice('UI_MODE', UI_MODES, DEFAULTS.uiMode),
    };

    if (read.problems.length > 0) throw new ConfigError(read.problems);

    return deepFreeze(config);
}

export function withOverrides(config: Config, overrides: ConfigOverrides): Config {
    return deepFreeze({
        ...config,
        llm: { ...config.llm, model: overrides.model ?? config.llm.model },
        search: { ...config.search, provider: overrides.provider ?? config.search.provider },
        research: { maxLoops: overrides.maxLoops ?? config.research.maxLoops },
        email: { ...config.email, enabled: overrides.emailEnabled ?? config.email.enabled },
        server: {
            host: overrides.host ?? config.server.host,
            port: overrides.port ?? config.server.port,
        },
        uiMode: overrides.uiMode ?? config.uiMode,
    });
}

export function isLocalEndpoint(baseUrl: string): boolean {
    try {
        const { hostname } = new URL(baseUrl);
        return hostname === 'localhost' || hostname === '127.0.0.1' || hostname === '::1' || hostname === '[::1]';
    } catch {
        return false;
    }
}

interface RequiredKey {
    env: string;
    label: string;
    secret: boolean;
    value: string;
}

/**
 * Environment keys the current selection needs, with their current values.
 */
export function requiredKeys(config: Config): RequiredKey[] {
    const keys: RequiredKey[] = [];
    const { search, llm, email } = config;

    if (search.provider === 'tavily') {
        keys.push({ env: 'TAVILY_API_KEY', label: 'Paste your Tavily API key', secret: true, value: search.tavilyApiKey });
    }
    if (search.provider === 'perplexity') {
        keys.push({ env: 'PERPLEXITY_API_KEY', label: 'Paste your Perplexity API key', secret: true, value: search.perplexityApiKey });
    }
    if (search.provider === 'youtube' || search.includeYoutube) {
        keys.push({ env: 'YOUTUBE_API_KEY', label: 'Paste your YouTube Data API key', secret: true, value: search.youtubeApiKey });
    }
    if (!isLocalEndpoint(llm.baseUrl)) {
        keys.push({ env: 'LLM_API_KEY', label: `Paste the API key for ${llm.baseUrl}`, secret: true, value: llm.apiKey });
    }
    if (email.enabled) {
        keys.push({ env: 'EMAIL_RECIPIENT', label: 'Email address that receives the report', secret: false, value: email.recipient });
    }

    return keys;
}

export function missingKeys(config: Config): RequiredKey[] {
    return requiredKeys(config).filter((key) => !key.value);
}

export function validateConfig(config: Config): { valid: boolean; errors: string[] } {
    const errors = missingKeys(config).map((key) => `${key.env} is not set`);

    if (config.email.enabled && config.email.recipient && !config.email.recipient.includes('@')) {
        errors.push(`EMAIL_RECIPIENT is not an email address: ${config.email.recipient}`);
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}

/**
 * Throw a ConfigError unless the configuration can start a run.
 */
export function assertValidConfig(config: Config): Config {
    const { valid, errors } = validateConfig(config);
    if (!valid) throw new ConfigError(errors);
    return config;
}

function maskSecret(value: string): string {
    if (!value) return '';
    if (value.length <= 8) return '****';
    return `${value.slice(0, 4)}…${value.slice(-2)}`;
}

/**
 * Configuration with every credential masked, safe to print or serve.
 */
export function maskConfig(config: Config): Config {
    return {
        ...config,
        llm: { ...config.llm, apiKey: maskSecret(config.llm.apiKey) },
        search: {
            ...config.search,
            tavilyApiKey: maskSecret(config.search.tavilyApiKey),
            perplexityApiKey: maskSecret(config.search.perplexityApiKey),
            youtubeApiKey: maskSecret(config.search.youtubeApiKey),
        },
        email: {
            ...config.email,
            smtp: { ...config.email.smtp, password: maskSecret(config.email.smtp.password) },
        },
    };
}

function escapeEnvValue(value: string): string {
    const trimmed = value.trim();
    if (trimmed === '') return '""';
    const needsQuotes = /[\s#"'\\]/.test(trimmed);
    if (!needsQuotes) return trimmed;
    const escaped = trimmed
        .replace(/\\/g, '\\\\')
        .replace(/\n/g, '\\n')
        .replace(/"/g, '\\"');
    return `"${escaped}"`;
}

async function updateEnvFile(envPath: string, updates: Record<string, string>): Promise<void> {
    let existing = '';
    try {
        existing = await readFile(envPath, 'utf8');
    } catch (error) {
        const code = error instanceof Error && 'code' in error ? error.code : undefined;
        if (code !== 'ENOENT') throw error;
    }

    const lines = existing.trim() === '' ? [] : existing.replace(/(\r?\n)+$/, '').split(/\r?\n/);
    const touched = new Set<string>();

    const nextLines = lines.map((line) => {
        if (line.trim().startsWith('#')) return line;
        const match = line.match(/^\s*([A-Z0-9_]+)\s*=\s*(.*)\s*$/);
        if (!match) return line;

        const key = match[1];
        if (!(key in updates)) return line;

        touched.add(key);
        return `${key}=${escapeEnvValue(updates[key])}`;
    });

    for (const [key, value] of Object.entries(updates)) {
        if (touched.has(key)) continue;
        nextLines.push(`${key}=${escapeEnvValue(value)}`);
    }

    const finalContents = `${nextLines.join('\n')}\n`;
    const writeOptions: { encoding: BufferEncoding; mode?: number } = { encoding: 'utf8' };
    if (existing === '') writeOptions.mode = 0o600;
    await writeFile(envPath, finalContents, writeOptions);
}

export function getDefaultEnvPath(): string {
    const explicit = process.env.RESEARCH_ENV_PATH?.trim();
    if (explicit) return path.isAbsolute(explicit) ? explicit : path.join(process.cwd(), explicit);
    return path.join(process.cwd(), '.env');
}

export async function writeEnvVars(
    updates: Record<string, string>,
    options: { envPath?: string } = {}
): Promise<void> {
    const envPath = options.envPath ?? getDefaultEnvPath();
    await updateEnvFile(envPath, updates);
    for (const [key, value] of Object.entries(updates)) {
        process.env[key] = value;
    }
}

function keyQuestion(key: RequiredKey): DistinctQuestion {
    const validate = (input: string) => input.trim().length > 0 || `${key.env} is required`;
    const defaultValue = key.value || undefined;
    if (key.secret) {
        return { type: 'password', name: key.env, message: key.label, mask: '*', default: defaultValue, validate };
    }
    return { type: 'input', name: key.env, message: key.label, default: defaultValue, validate };
}

/**
 * Load the configuration, prompting for missing keys when a terminal is attached.
 * Answers are saved to the .env file so the next run picks them up.
 */
export async function ensureConfig(
    options: { envPath?: string; force?: boolean; overrides?: ConfigOverrides } = {}
): Promise<Config> {
    const overrides = options.overrides ?? {};
    const current = withOverrides(loadConfig(), overrides);
    const missing = options.force ? requiredKeys(current) : missingKeys(current);

    if (missing.length === 0) return current;

    const canPrompt = Boolean(process.stdin.isTTY && process.stdout.isTTY);
    if (!canPrompt) {
        throw new ConfigError(missing.map((key) => `${key.env} is not set`));
    }

    const inquirer = (await import('inquirer')).default;
    const answers = await inquirer.prompt(missing.map(keyQuestion));

    const updates: Record<string, string> = {};
    for (const key of missing) {
        const value = String(answers[key.env] ?? '').trim();
        if (value) updates[key.env] = value;
    }

    await writeEnvVars(updates, { envPath: options.envPath });

    return withOverrides(loadConfig(), overrides);
}
