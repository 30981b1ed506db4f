import { z } from 'zod';
import { ConfigurationError } from './errors';

/**
 * Tunables of the engine. Every threshold the protocol depends on lives here
 * rather than in the code that reads it.
 */
export const EngineConfigSchema = z.object({
    /** Change ratio above which a full snapshot replaces a delta. */
    fullResyncRatio: z.number().gt(0).lte(1),
    /** Quiet period after the last local edit before a diff is sent. */
    debounceIntervalMs: z.number().int().nonnegative(),
    keepaliveIntervalMs: z.number().int().positive(),
    /** Bounded wait for the transport to open during `connect()`. */
    connectTimeoutMs: z.number().int().positive(),
    autoReconnect: z.boolean(),
    maxReconnectAttempts: z.number().int().nonnegative(),
    /** Base delay for reconnection backoff. */
    initialReconnectDelayMs: z.number().int().nonnegative(),
    /** Maximum delay between reconnect attempts. */
    maxReconnectDelayMs: z.number().int().nonnegative(),
    /** Push a full snapshot whenever another participant joins. */
    snapshotOnPeerJoin: z.boolean(),
    debug: z.boolean(),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_CONFIG: Readonly<EngineConfig> = Object.freeze({
    fullResyncRatio: 0.3,
    debounceIntervalMs: 2000,
    keepaliveIntervalMs: 5000,
    connectTimeoutMs: 5000,
    autoReconnect: false,
    maxReconnectAttempts: 5,
    initialReconnectDelayMs: 1000,
    maxReconnectDelayMs: 10000,
    snapshotOnPeerJoin: false,
    debug: false,
});

/**
 * Merges `overrides` over the defaults and validates the result.
 * Keys explicitly set to `undefined` keep their default.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
    const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) {
            merged[key] = value;
        }
    }

    const result = EngineConfigSchema.strict().safeParse(merged);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join(', ');
        throw new ConfigurationError(`Invalid engine config: ${details}`);
    }
    return result.data;
}
