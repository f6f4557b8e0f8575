import Joi from 'joi';
import { ConfigurationError } from '../middleware/errorHandler';

export type TelemetryExporter = 'log' | 'http' | 'redis';

export interface RiskModelConfig {
    riskThreshold: number;
    bandBoundaries: number[];
    bandScores: number[];
    bandLabels: string[];
    riskFactorWeights: Record<string, number>;
}

export interface Settings {
    port: number;
    nodeEnv: string;
    logLevel: string;
    serviceName: string;
    serviceVersion: string;
    risk: RiskModelConfig;
    mockLatencyMinMs: number;
    mockLatencyMaxMs: number;
    telemetry: {
        exporter: TelemetryExporter;
        otlpEndpoint: string;
        otlpApiKey: string;
        streamPrefix: string;
        queueCapacity: number;
        batchSize: number;
        metricsExportIntervalMs: number;
    };
    redis: {
        host: string;
        port: number;
        password?: string;
    };
    strictSpanLifecycle: boolean;
}

export const DEFAULT_RISK_CONFIG: RiskModelConfig = {
    riskThreshold: 70,
    bandBoundaries: [50, 1000],
    bandScores: [10, 35, 55],
    bandLabels: ['low', 'medium', 'high'],
    riskFactorWeights: {
        merchant_category: 10,
        velocity: 10,
        location: 8
    }
};

interface EnvVars {
    PORT: number;
    NODE_ENV: string;
    LOG_LEVEL: string;
    SERVICE_NAME: string;
    SERVICE_VERSION: string;
    RISK_THRESHOLD: number;
    RISK_BAND_BOUNDARIES?: string;
    RISK_BAND_SCORES?: string;
    RISK_BAND_LABELS?: string;
    RISK_FACTOR_WEIGHTS?: string;
    MOCK_LATENCY_MIN_MS: number;
    MOCK_LATENCY_MAX_MS: number;
    TELEMETRY_EXPORTER: TelemetryExporter;
    OTLP_ENDPOINT: string;
    OTLP_API_KEY: string;
    TELEMETRY_STREAM_PREFIX: string;
    EMISSION_QUEUE_CAPACITY: number;
    EMISSION_BATCH_SIZE: number;
    METRICS_EXPORT_INTERVAL_MS: number;
    REDIS_HOST: string;
    REDIS_PORT: number;
    REDIS_PASSWORD?: string;
    STRICT_SPAN_LIFECYCLE?: boolean;
}

const envSchema = Joi.object<EnvVars>({
    PORT: Joi.number().port().default(3000),
    NODE_ENV: Joi.string().valid('development', 'production', 'test').default('development'),
    LOG_LEVEL: Joi.string().valid('error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly').default('info'),
    SERVICE_NAME: Joi.string().default('fraud-trace-service'),
    SERVICE_VERSION: Joi.string().default('1.0.0'),
    RISK_THRESHOLD: Joi.number().min(0).max(100).default(DEFAULT_RISK_CONFIG.riskThreshold),
    RISK_BAND_BOUNDARIES: Joi.string().optional(),
    RISK_BAND_SCORES: Joi.string().optional(),
    RISK_BAND_LABELS: Joi.string().optional(),
    RISK_FACTOR_WEIGHTS: Joi.string().allow('').optional(),
    MOCK_LATENCY_MIN_MS: Joi.number().integer().min(0).default(200),
    MOCK_LATENCY_MAX_MS: Joi.number().integer().min(Joi.ref('MOCK_LATENCY_MIN_MS')).default(500),
    TELEMETRY_EXPORTER: Joi.string().valid('log', 'http', 'redis').default('log'),
    OTLP_ENDPOINT: Joi.string().uri().default('http://localhost:4318'),
    OTLP_API_KEY: Joi.string().allow('').default(''),
    TELEMETRY_STREAM_PREFIX: Joi.string().default('telemetry'),
    EMISSION_QUEUE_CAPACITY: Joi.number().integer().min(1).default(1000),
    EMISSION_BATCH_SIZE: Joi.number().integer().min(1).default(50),
    METRICS_EXPORT_INTERVAL_MS: Joi.number().integer().min(1000).default(60000),
    REDIS_HOST: Joi.string().default('localhost'),
    REDIS_PORT: Joi.number().port().default(6379),
    REDIS_PASSWORD: Joi.string().allow('').optional(),
    STRICT_SPAN_LIFECYCLE: Joi.boolean().optional()
}).unknown(true);

const riskSchema = Joi.object<RiskModelConfig>({
    riskThreshold: Joi.number().min(0).max(100).required(),
    bandBoundaries: Joi.array().items(Joi.number().positive()).required()
        .custom((value: number[], helpers) => {
            for (let i = 1; i < value.length; i++) {
                if (value[i] <= value[i - 1]) {
                    return helpers.message({ custom: 'band boundaries must be strictly ascending' });
                }
            }
            return value;
        }),
    bandScores: Joi.array().items(Joi.number().min(0).max(100))
        .length(Joi.ref('bandBoundaries.length', { adjust: (length: number) => length + 1 }))
        .required()
        .custom((value: number[], helpers) => {
            for (let i = 1; i < value.length; i++) {
                if (value[i] < value[i - 1]) {
                    return helpers.message({ custom: 'band scores must be non-decreasing' });
                }
            }
            return value;
        }),
    bandLabels: Joi.array().items(Joi.string().min(1))
        .length(Joi.ref('bandScores.length'))
        .required(),
    riskFactorWeights: Joi.object().pattern(Joi.string().min(1), Joi.number()).required()
});

const parseNumberList = (name: string, raw: string): number[] => {
    return raw.split(',').map(part => {
        const value = Number(part.trim());
        if (part.trim() === '' || !Number.isFinite(value)) {
            throw new ConfigurationError(`${name} contains a non-numeric entry: "${part}"`);
        }
        return value;
    });
};

const parseWeights = (raw: string): Record<string, number> => {
    const weights: Record<string, number> = {};
    if (raw.trim() === '') {
        return weights;
    }

    for (const entry of raw.split(',')) {
        const [name, weight] = entry.split(':').map(part => part.trim());
        const value = Number(weight);
        if (!name || weight === undefined || weight === '' || !Number.isFinite(value)) {
            throw new ConfigurationError(`RISK_FACTOR_WEIGHTS entry "${entry}" must look like name:weight`);
        }
        weights[name] = value;
    }

    return weights;
};

export const validateRiskConfig = (config: RiskModelConfig): RiskModelConfig => {
    const result = riskSchema.validate(config, { convert: false });
    if (result.error !== undefined) {
        throw new ConfigurationError(`Invalid risk model configuration: ${result.error.message}`);
    }
    return result.value;
};

export const loadSettings = (env: NodeJS.ProcessEnv = process.env): Settings => {
    const result = envSchema.validate(env, { abortEarly: true });
    if (result.error !== undefined) {
        throw new ConfigurationError(`Invalid environment configuration: ${result.error.message}`);
    }
    const value = result.value;

    const risk = validateRiskConfig({
        riskThreshold: value.RISK_THRESHOLD,
        bandBoundaries: value.RISK_BAND_BOUNDARIES
            ? parseNumberList('RISK_BAND_BOUNDARIES', value.RISK_BAND_BOUNDARIES)
            : DEFAULT_RISK_CONFIG.bandBoundaries,
        bandScores: value.RISK_BAND_SCORES
            ? parseNumberList('RISK_BAND_SCORES', value.RISK_BAND_SCORES)
            : DEFAULT_RISK_CONFIG.bandScores,
        bandLabels: value.RISK_BAND_LABELS
            ? value.RISK_BAND_LABELS.split(',').map(label => label.trim())
            : DEFAULT_RISK_CONFIG.bandLabels,
        riskFactorWeights: value.RISK_FACTOR_WEIGHTS !== undefined
            ? parseWeights(value.RISK_FACTOR_WEIGHTS)
            : DEFAULT_RISK_CONFIG.riskFactorWeights
    });

    return {
        port: value.PORT,
        nodeEnv: value.NODE_ENV,
        logLevel: value.LOG_LEVEL,
        serviceName: value.SERVICE_NAME,
        serviceVersion: value.SERVICE_VERSION,
        risk,
        mockLatencyMinMs: value.MOCK_LATENCY_MIN_MS,
        mockLatencyMaxMs: value.MOCK_LATENCY_MAX_MS,
        telemetry: {
            exporter: value.TELEMETRY_EXPORTER,
            otlpEndpoint: value.OTLP_ENDPOINT,
            otlpApiKey: value.OTLP_API_KEY,
            streamPrefix: value.TELEMETRY_STREAM_PREFIX,
            queueCapacity: value.EMISSION_QUEUE_CAPACITY,
            batchSize: value.EMISSION_BATCH_SIZE,
            metricsExportIntervalMs: value.METRICS_EXPORT_INTERVAL_MS
        },
        redis: {
            host: value.REDIS_HOST,
            port: value.REDIS_PORT,
            password: value.REDIS_PASSWORD || undefined
        },
        strictSpanLifecycle: value.STRICT_SPAN_LIFECYCLE ?? value.NODE_ENV !== 'production'
    };
};
