import { z } from 'zod';
import { LOG_LEVELS } from './logger.js';

const booleanFlag = z
    .enum(['true', 'false'])
    .default('true')
    .transform((value) => value === 'true');

const EnvSchema = z.object({
    API_URL: z.string().url().default('http://localhost:8080'),
    READY_TIMEOUT_SECONDS: z.coerce.number().int().positive().default(30),
    READY_INTERVAL_MS: z.coerce.number().int().nonnegative().default(1000),
    REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
    TEST_USERNAME: z.string().min(1).default('testuser'),
    TEST_PASSWORD: z.string().min(1).default('testpass123'),
    TEST_SERVICE_NAME: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'must be a lowercase slug').default('test-service'),
    DASHBOARD_URL: z.string().url().default('http://localhost:9002'),
    ARTIFACT_DIR: z.string().min(1).default('webui'),
    SCREENSHOT_PATH: z.string().min(1).default('verification/dashboard.png'),
    HEADLESS: booleanFlag,
    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export interface HarnessConfig {
    apiUrl: string;
    readiness: {
        timeoutSeconds: number;
        intervalMs: number;
    };
    requestTimeoutMs?: number;
    credentials: {
        username: string;
        password: string;
    };
    serviceName: string;
    dashboardUrl: string;
    artifactDir: string;
    screenshotPath: string;
    headless: boolean;
}

export class ConfigError extends Error {
    readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

type Env = Record<string, string | undefined>;

// Blank variables fall back to their defaults.
function withoutBlankValues(env: Env): Record<string, string> {
    const cleaned: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (typeof value === 'string' && value.trim().length > 0) {
            cleaned[key] = value;
        }
    }
    return cleaned;
}

export function loadConfig(env: Env = process.env): HarnessConfig {
    const parsed = EnvSchema.safeParse(withoutBlankValues(env));
    if (!parsed.success) {
        throw new ConfigError(
            parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        );
    }

    const values = parsed.data;
    return {
        apiUrl: values.API_URL.replace(/\/+$/, ''),
        readiness: {
            timeoutSeconds: values.READY_TIMEOUT_SECONDS,
            intervalMs: values.READY_INTERVAL_MS,
        },
        requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
        credentials: {
            username: values.TEST_USERNAME,
            password: values.TEST_PASSWORD,
        },
        serviceName: values.TEST_SERVICE_NAME,
        dashboardUrl: values.DASHBOARD_URL,
        artifactDir: values.ARTIFACT_DIR,
        screenshotPath: values.SCREENSHOT_PATH,
        headless: values.HEADLESS,
    };
}
