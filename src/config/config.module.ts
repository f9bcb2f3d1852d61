import { Module, Global } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import { z } from 'zod';

const numeric = (fallback: string) => z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

// Zod schema for environment validation
export const envSchema = z.object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    PORT: numeric('3000'),
    LOG_LEVEL: z.enum(['silent', 'fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
    LOKI_HOST: z.string().url().optional(),

    // Reference tables
    COORDINATES_URL: z.string().url(),
    CAPITALS_URL: z.string().url(),
    REFERENCE_EXCLUDED_IDS: z
        .string()
        .default('US')
        .transform((value) => value.split(',').map((id) => id.trim()).filter((id) => id.length > 0)),

    // Prediction service
    ISS_PASS_API_URL: z.string().url().default('http://api.open-notify.org/iss-pass.json'),
    ISS_PASS_COUNT: numeric('5').pipe(z.number().max(100)),

    // Outbound HTTP
    HTTP_TIMEOUT_MS: numeric('10000'),

    // Presentation
    DISPLAY_TIMEZONE: z
        .string()
        .default('UTC')
        .refine(isKnownTimeZone, { message: 'Unknown IANA time zone' }),
});

export type EnvConfig = z.infer<typeof envSchema>;

function isKnownTimeZone(timeZone: string): boolean {
    try {
        new Intl.DateTimeFormat('en-US', { timeZone });
        return true;
    } catch {
        return false;
    }
}

@Global()
@Module({
    imports: [
        NestConfigModule.forRoot({
            envFilePath: ['.env.local', '.env'],
            validate: (config) => {
                const result = envSchema.safeParse(config);
                if (!result.success) {
                    console.error('Invalid environment configuration:');
                    console.error(result.error.format());
                    throw new Error('Invalid environment configuration');
                }
                return result.data;
            },
        }),
    ],
    providers: [ConfigService],
    exports: [ConfigService],
})
export class ConfigModule { }
