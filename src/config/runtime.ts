import { z } from 'zod';
import type { CardStyle } from '../cards/unicode.js';

export type Runtime = {
    production: boolean;
    packs: number;
    seed: number | undefined;
    dealerDelayMs: number;
    cardsStyle: CardStyle;
    showShoe: boolean;
    logLevel: 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';
    pretty: boolean;
};

const flag = z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
    BJ_PRODUCTION: flag,
    BJ_PACKS: z.coerce.number().int().min(1).max(64).default(6),
    BJ_SEED: z.coerce.number().int().optional(),
    BJ_DEALER_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    BJ_CARDS_STYLE: z.enum(['text', 'unicode']).default('text'),
    BJ_SHOW_SHOE: flag,
    LOG_LEVEL: z.enum(['silent', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
});

export class ConfigError extends Error {}

/** Reads BJ_* settings from the environment. Blank values count as unset. */
export function resolveRuntime(env: NodeJS.ProcessEnv = process.env): Runtime {
    const input = Object.fromEntries(
        Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== "")
    );
    const parsed = envSchema.safeParse(input);
    if (!parsed.success) {
        const bad = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
        throw new ConfigError(`Invalid configuration: ${bad}`);
    }
    const cfg = parsed.data;
    const production = cfg.BJ_PRODUCTION;
    return {
        production,
        packs: cfg.BJ_PACKS,
        seed: cfg.BJ_SEED,
        dealerDelayMs: cfg.BJ_DEALER_DELAY_MS,
        cardsStyle: cfg.BJ_CARDS_STYLE,
        showShoe: cfg.BJ_SHOW_SHOE && !production,
        logLevel: cfg.LOG_LEVEL ?? 'info',
        pretty: !production,
    };
}
