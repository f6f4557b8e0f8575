import { randomBytes } from 'crypto';
import { TraceContext } from '../types/telemetry';

const TRACE_ID_PATTERN = /^[0-9a-f]{32}$/;
const SPAN_ID_PATTERN = /^[0-9a-f]{16}$/;
const TRACEPARENT_PATTERN = /^([0-9a-f]{2})-([0-9a-f]{32})-([0-9a-f]{16})-([0-9a-f]{2})$/;

const INVALID_TRACE_ID = '0'.repeat(32);
const INVALID_SPAN_ID = '0'.repeat(16);

const randomHex = (bytes: number, invalid: string): string => {
    let id = randomBytes(bytes).toString('hex');
    while (id === invalid) {
        id = randomBytes(bytes).toString('hex');
    }
    return id;
};

/** 128 random bits as 32 lowercase hex characters; never all zeros. */
export const generateTraceId = (): string => randomHex(16, INVALID_TRACE_ID);

/** 64 random bits as 16 lowercase hex characters; never all zeros. */
export const generateSpanId = (): string => randomHex(8, INVALID_SPAN_ID);

export const isValidTraceId = (value: string): boolean => TRACE_ID_PATTERN.test(value) && value !== INVALID_TRACE_ID;

export const isValidSpanId = (value: string): boolean => SPAN_ID_PATTERN.test(value) && value !== INVALID_SPAN_ID;

export const createTraceContext = (): TraceContext => ({
    traceId: generateTraceId(),
    parentSpanId: null
});

/**
 * Continues the caller's trace from a W3C `traceparent` header, so the caller's
 * span becomes the parent of our root span. Anything missing or malformed
 * starts a fresh trace instead.
 */
export const attachTraceContext = (traceparent: string | string[] | undefined): TraceContext => {
    const header = Array.isArray(traceparent) ? traceparent[0] : traceparent;
    if (!header) {
        return createTraceContext();
    }

    const match = TRACEPARENT_PATTERN.exec(header.trim().toLowerCase());
    if (!match) {
        return createTraceContext();
    }

    const [, version, traceId, parentSpanId] = match;
    if (version === 'ff' || !isValidTraceId(traceId) || !isValidSpanId(parentSpanId)) {
        return createTraceContext();
    }

    return { traceId, parentSpanId };
};

export const formatTraceparent = (traceId: string, spanId: string): string => `00-${traceId}-${spanId}-01`;
