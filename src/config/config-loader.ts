// src/config/config-loader.ts

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';
import * as yaml from 'yaml';
import {
    type LLMProvider,
    OllamaProvider,
    OpenAIProvider,
    OpenRouterProvider,
} from '../providers/index.js';
import { ConfigError, errorMessage } from '../errors.js';

export type ProviderName = 'openai' | 'openrouter' | 'ollama';

export interface ProviderDetails {
    host?: string;
    base_url?: string;
    api_key_env?: string;
}

export interface ModelSettings {
    default: string;
    largeContext: string;
    description: string;
    smokeTest: string;
}

export interface ReviewSettings {
    chunkThresholdTokens: number;
    largeContextThresholdTokens: number;
    maxOutputTokens: number;
    chunkMaxOutputTokens: number;
    temperature: number;
    maxRecommendations: number;
}

export interface DiffSettings {
    skipExtensions: string[];
    maxFileChanges: number;
    truncatedPatchLines: number;
}

export interface DescriptionSettings {
    maxOutputTokens: number;
    temperature: number;
    recentCommits: number;
}

export interface FileConfig {
    llm: {
        provider: ProviderName;
        providers: Record<string, ProviderDetails>;
        models: ModelSettings;
    };
    review: ReviewSettings;
    diff: DiffSettings;
    description: DescriptionSettings;
}

export interface PromptTemplates {
    review: string;
    chunk: string;
    description: string;
}

/** Everything a run needs, resolved once at the entry point. */
export interface ReviewConfig {
    githubToken: string;
    llm: {
        provider: ProviderName;
        endpoint: string;
        apiKey?: string;
    };
    models: ModelSettings;
    /** Set when the operator names a model explicitly; replaces size-based selection. */
    modelOverride?: string;
    review: ReviewSettings;
    diff: DiffSettings;
    description: DescriptionSettings;
    prompts: PromptTemplates;
}

export interface ConfigOverrides {
    githubToken?: string;
    model?: string;
}

export interface ConfigLoaderOptions {
    configDir?: string;
    /** Path of the dotenv file to load, or false to skip it. Defaults to `.env` in the working directory. */
    envFile?: string | false;
    env?: NodeJS.ProcessEnv;
}

type ProviderConstructor = new (endpoint: string, apiKey?: string) => LLMProvider;

const ProviderMap: Record<ProviderName, ProviderConstructor> = {
    openai: OpenAIProvider,
    openrouter: OpenRouterProvider,
    ollama: OllamaProvider,
};

const DEFAULT_ENDPOINTS: Record<ProviderName, string> = {
    openai: 'https://api.openai.com/v1',
    openrouter: 'https://openrouter.ai/api/v1',
    ollama: 'http://localhost:11434',
};

const DEFAULT_KEY_ENV: Partial<Record<ProviderName, string>> = {
    openai: 'OPENAI_API_KEY',
    openrouter: 'OPENROUTER_API_KEY',
};

export const DEFAULT_CONFIG: FileConfig = {
    llm: {
        provider: 'openai',
        providers: {},
        models: {
            default: 'gpt-4',
            largeContext: 'gpt-3.5-turbo-16k',
            description: 'gpt-4',
            smokeTest: 'gpt-3.5-turbo',
        },
    },
    review: {
        chunkThresholdTokens: 6000,
        largeContextThresholdTokens: 4000,
        maxOutputTokens: 2000,
        chunkMaxOutputTokens: 1500,
        temperature: 0.1,
        maxRecommendations: 5,
    },
    diff: {
        skipExtensions: ['.png', '.jpg', '.jpeg', '.gif', '.pdf', '.zip', '.tar.gz'],
        maxFileChanges: 1000,
        truncatedPatchLines: 500,
    },
    description: {
        maxOutputTokens: 300,
        temperature: 0.3,
        recentCommits: 5,
    },
};

export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL('../../config/', import.meta.url));

const CONFIG_FILE = 'review-config.yml';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(parent: Record<string, unknown>, key: string, where: string): Record<string, unknown> {
    const value = parent[key];
    if (value === undefined || value === null) return {};
    if (!isRecord(value)) {
        throw new ConfigError(`Invalid configuration in ${where}: '${key}' must be a mapping.`);
    }
    return value;
}

function readString(record: Record<string, unknown>, key: string, fallback: string, where: string): string {
    const value = record[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'string') {
        throw new ConfigError(`Invalid configuration in ${where}: '${key}' must be a string.`);
    }
    return value;
}

function readNumber(record: Record<string, unknown>, key: string, fallback: number, where: string): number {
    const value = record[key];
    if (value === undefined || value === null) return fallback;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new ConfigError(`Invalid configuration in ${where}: '${key}' must be a number.`);
    }
    return value;
}

function readStringList(record: Record<string, unknown>, key: string, fallback: string[], where: string): string[] {
    const value = record[key];
    if (value === undefined || value === null) return fallback;
    if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
        throw new ConfigError(`Invalid configuration in ${where}: '${key}' must be a list of strings.`);
    }
    return value;
}

function isProviderName(value: string): value is ProviderName {
    return Object.hasOwn(ProviderMap, value);
}

export class ConfigLoader {
    private readonly configDir: string;
    private readonly configPath: string;
    private readonly env: NodeJS.ProcessEnv;
    private _config?: FileConfig;

    constructor(options: ConfigLoaderOptions = {}) {
        this.configDir = options.configDir ?? DEFAULT_CONFIG_DIR;
        this.configPath = path.join(this.configDir, CONFIG_FILE);
        this.env = options.env ?? process.env;

        if (options.envFile !== false) {
            this.loadEnvironmentVariables(options.envFile ?? path.resolve(process.cwd(), '.env'));
        }
    }

    public get config(): FileConfig {
        if (!this._config) {
            this._config = this.loadConfig();
        }
        return this._config;
    }

    private loadEnvironmentVariables(envPath: string): void {
        if (!fs.existsSync(envPath)) {
            return;
        }
        // dotenv never overwrites variables already set in the environment.
        const result = dotenv.config({ path: envPath });
        if (result.error) {
            console.warn(`⚠️  Could not load ${envPath}: ${result.error.message}. Proceeding without it.`);
            return;
        }
        console.log(`✓ Loaded environment from ${envPath}`);
    }

    private loadConfig(): FileConfig {
        if (!fs.existsSync(this.configPath)) {
            return DEFAULT_CONFIG;
        }

        let parsed: unknown;
        try {
            parsed = yaml.parse(fs.readFileSync(this.configPath, 'utf8'));
        } catch (e) {
            throw new ConfigError(`Failed to parse ${this.configPath}: ${errorMessage(e)}`);
        }

        if (parsed === null || parsed === undefined) {
            return DEFAULT_CONFIG;
        }
        if (!isRecord(parsed)) {
            throw new ConfigError(`Invalid configuration structure loaded from ${this.configPath}. Expected a mapping at the top level.`);
        }

        return this.parseFileConfig(parsed);
    }

    private parseFileConfig(root: Record<string, unknown>): FileConfig {
        const where = this.configPath;
        const defaults = DEFAULT_CONFIG;

        const llm = section(root, 'llm', where);
        const provider = readString(llm, 'provider', defaults.llm.provider, where);
        if (!isProviderName(provider)) {
            throw new ConfigError(`Unknown LLM provider '${provider}' in ${where}. Expected one of: ${Object.keys(ProviderMap).join(', ')}.`);
        }

        const providers: Record<string, ProviderDetails> = {};
        for (const [name, details] of Object.entries(section(llm, 'providers', where))) {
            if (!isRecord(details)) {
                throw new ConfigError(`Invalid configuration in ${where}: provider '${name}' must be a mapping.`);
            }
            providers[name] = {
                host: details.host === undefined ? undefined : readString(details, 'host', '', where),
                base_url: details.base_url === undefined ? undefined : readString(details, 'base_url', '', where),
                api_key_env: details.api_key_env === undefined ? undefined : readString(details, 'api_key_env', '', where),
            };
        }

        const models = section(llm, 'models', where);
        const review = section(root, 'review', where);
        const diff = section(root, 'diff', where);
        const description = section(root, 'description', where);

        return {
            llm: {
                provider,
                providers,
                models: {
                    default: readString(models, 'default', defaults.llm.models.default, where),
                    largeContext: readString(models, 'large_context', defaults.llm.models.largeContext, where),
                    description: readString(models, 'description', defaults.llm.models.description, where),
                    smokeTest: readString(models, 'smoke_test', defaults.llm.models.smokeTest, where),
                },
            },
            review: {
                chunkThresholdTokens: readNumber(review, 'chunk_threshold_tokens', defaults.review.chunkThresholdTokens, where),
                largeContextThresholdTokens: readNumber(review, 'large_context_threshold_tokens', defaults.review.largeContextThresholdTokens, where),
                maxOutputTokens: readNumber(review, 'max_output_tokens', defaults.review.maxOutputTokens, where),
                chunkMaxOutputTokens: readNumber(review, 'chunk_max_output_tokens', defaults.review.chunkMaxOutputTokens, where),
                temperature: readNumber(review, 'temperature', defaults.review.temperature, where),
                maxRecommendations: readNumber(review, 'max_recommendations', defaults.review.maxRecommendations, where),
            },
            diff: {
                skipExtensions: readStringList(diff, 'skip_extensions', defaults.diff.skipExtensions, where),
                maxFileChanges: readNumber(diff, 'max_file_changes', defaults.diff.maxFileChanges, where),
                truncatedPatchLines: readNumber(diff, 'truncated_patch_lines', defaults.diff.truncatedPatchLines, where),
            },
            description: {
                maxOutputTokens: readNumber(description, 'max_output_tokens', defaults.description.maxOutputTokens, where),
                temperature: readNumber(description, 'temperature', defaults.description.temperature, where),
                recentCommits: readNumber(description, 'recent_commits', defaults.description.recentCommits, where),
            },
        };
    }

    /**
     * @param name The template name under `prompts/`, without the `.md` extension.
     */
    public getPromptTemplate(name: string): string {
        const promptPath = path.join(this.configDir, 'prompts', `${name}.md`);
        try {
            return fs.readFileSync(promptPath, 'utf8');
        } catch (e) {
            throw new ConfigError(`Failed to load prompt template '${name}' from ${promptPath}: ${errorMessage(e)}`);
        }
    }

    /** Name of the environment variable holding the completion API key, if the provider needs one. */
    public getApiKeyEnv(): string | undefined {
        const { provider, providers } = this.config.llm;
        return providers[provider]?.api_key_env ?? DEFAULT_KEY_ENV[provider];
    }

    public getRequiredEnvVars(): string[] {
        const apiKeyEnv = this.getApiKeyEnv();
        return apiKeyEnv ? ['GITHUB_TOKEN', apiKeyEnv] : ['GITHUB_TOKEN'];
    }

    public getMissingEnvVars(): string[] {
        return this.getRequiredEnvVars().filter(name => !this.env[name]);
    }

    /**
     * Builds the run configuration. Flags win over the environment.
     * Throws ConfigError when a credential is missing, before any API call is made.
     */
    public resolve(overrides: ConfigOverrides = {}): ReviewConfig {
        const fileConfig = this.config;

        const githubToken = overrides.githubToken || this.env.GITHUB_TOKEN;
        if (!githubToken) {
            throw new ConfigError('GitHub token required. Set GITHUB_TOKEN environment variable or use --token option.');
        }

        const provider = fileConfig.llm.provider;
        const details = fileConfig.llm.providers[provider];
        const apiKeyEnv = this.getApiKeyEnv();
        const apiKey = apiKeyEnv ? this.env[apiKeyEnv] : undefined;
        if (apiKeyEnv && !apiKey) {
            throw new ConfigError(`${apiKeyEnv} environment variable is required.`);
        }

        const modelOverride = overrides.model && overrides.model !== 'auto' ? overrides.model : undefined;

        return {
            githubToken,
            llm: {
                provider,
                endpoint: details?.base_url || details?.host || DEFAULT_ENDPOINTS[provider],
                apiKey,
            },
            models: fileConfig.llm.models,
            modelOverride,
            review: fileConfig.review,
            diff: fileConfig.diff,
            description: fileConfig.description,
            prompts: {
                review: this.getPromptTemplate('pr-review'),
                chunk: this.getPromptTemplate('pr-review-chunk'),
                description: this.getPromptTemplate('pr-description'),
            },
        };
    }

    public createProvider(config: ReviewConfig): LLMProvider {
        const ProviderClass = ProviderMap[config.llm.provider];
        return new ProviderClass(config.llm.endpoint, config.llm.apiKey);
    }
}
