import { DEFAULT_RISK_CONFIG, loadSettings, validateRiskConfig } from '../../src/config/settings';
import { ConfigurationError } from '../../src/middleware/errorHandler';

describe('loadSettings', () => {
    it('applies defaults', () => {
        const settings = loadSettings({});

        expect(settings.port).toBe(3000);
        expect(settings.nodeEnv).toBe('development');
        expect(settings.risk).toEqual(DEFAULT_RISK_CONFIG);
        expect(settings.mockLatencyMinMs).toBe(200);
        expect(settings.mockLatencyMaxMs).toBe(500);
        expect(settings.telemetry).toEqual({
            exporter: 'log',
            otlpEndpoint: 'http://localhost:4318',
            otlpApiKey: '',
            streamPrefix: 'telemetry',
            queueCapacity: 1000,
            batchSize: 50,
            metricsExportIntervalMs: 60000
        });
        expect(settings.redis).toEqual({ host: 'localhost', port: 6379, password: undefined });
        expect(settings.strictSpanLifecycle).toBe(true);
    });

    it('parses numeric variables', () => {
        const settings = loadSettings({ PORT: '8080', RISK_THRESHOLD: '55.5', EMISSION_QUEUE_CAPACITY: '10' });

        expect(settings.port).toBe(8080);
        expect(settings.risk.riskThreshold).toBe(55.5);
        expect(settings.telemetry.queueCapacity).toBe(10);
    });

    it('relaxes span lifecycle checks in production unless told otherwise', () => {
        expect(loadSettings({ NODE_ENV: 'production' }).strictSpanLifecycle).toBe(false);
        expect(loadSettings({ NODE_ENV: 'production', STRICT_SPAN_LIFECYCLE: 'true' }).strictSpanLifecycle).toBe(true);
    });

    it('reads band and weight overrides', () => {
        const settings = loadSettings({
            RISK_BAND_BOUNDARIES: '100, 500, 2000',
            RISK_BAND_SCORES: '5,20,40,60',
            RISK_BAND_LABELS: 'tiny,low,medium,high',
            RISK_FACTOR_WEIGHTS: 'velocity:50, location:-5'
        });

        expect(settings.risk.bandBoundaries).toEqual([100, 500, 2000]);
        expect(settings.risk.bandScores).toEqual([5, 20, 40, 60]);
        expect(settings.risk.bandLabels).toEqual(['tiny', 'low', 'medium', 'high']);
        expect(settings.risk.riskFactorWeights).toEqual({ velocity: 50, location: -5 });
    });

    it('allows an empty factor list', () => {
        expect(loadSettings({ RISK_FACTOR_WEIGHTS: '' }).risk.riskFactorWeights).toEqual({});
    });

    it.each([
        ['a non-numeric threshold', { RISK_THRESHOLD: 'abc' }],
        ['a threshold above 100', { RISK_THRESHOLD: '101' }],
        ['unsorted band boundaries', { RISK_BAND_BOUNDARIES: '1000,50' }],
        ['a non-numeric band boundary', { RISK_BAND_BOUNDARIES: '50,lots' }],
        ['a weight without a value', { RISK_FACTOR_WEIGHTS: 'velocity' }],
        ['an unknown exporter', { TELEMETRY_EXPORTER: 'kafka' }],
        ['inverted mock latency', { MOCK_LATENCY_MIN_MS: '500', MOCK_LATENCY_MAX_MS: '100' }]
    ])('rejects %s', (_label, env) => {
        expect(() => loadSettings(env)).toThrow(ConfigurationError);
    });
});

describe('validateRiskConfig', () => {
    it('accepts the default model', () => {
        expect(validateRiskConfig(DEFAULT_RISK_CONFIG)).toEqual(DEFAULT_RISK_CONFIG);
    });

    it('requires one score per band', () => {
        expect(() => validateRiskConfig({ ...DEFAULT_RISK_CONFIG, bandScores: [10, 35] })).toThrow(ConfigurationError);
    });

    it('requires non-decreasing band scores', () => {
        expect(() => validateRiskConfig({ ...DEFAULT_RISK_CONFIG, bandScores: [10, 55, 35] })).toThrow(
            'band scores must be non-decreasing'
        );
    });

    it('requires one label per band', () => {
        expect(() => validateRiskConfig({ ...DEFAULT_RISK_CONFIG, bandLabels: ['low', 'high'] })).toThrow(ConfigurationError);
    });
});
