import { IANAZone } from 'luxon';
import { z } from 'zod';

const numericString = z.string().regex(/^\d+$/).transform(Number);

const timezoneSchema = z
  .string()
  .min(1)
  .refine((value) => IANAZone.isValidZone(value), { message: 'Must be a valid IANA timezone' });

const intakeEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'staging', 'production']).default('development'),
  HOST: z.string().min(1).default('0.0.0.0'),
  PORT: numericString.default('8000'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  WEBHOOK_SECRET: z.string().min(1).optional(),
  DEFAULT_TIMEZONE: timezoneSchema.default('America/New_York'),
  DISPLAY_TIMEZONE: timezoneSchema.optional(),
  BUSINESS_NAME: z.string().min(1).default('Front Desk'),
  CHANNEL_TIMEOUT_MS: numericString.default('10000'),
  APPOINTMENT_DURATION_MINUTES: numericString.default('30'),
  CALENDAR_TRANSCRIPT_MAX_CHARS: numericString.default('4000'),
  GOOGLE_SERVICE_ACCOUNT_JSON_B64: z.string().min(1).optional(),
  GOOGLE_CALENDAR_ID: z.string().min(1).default('primary'),
  TWILIO_ACCOUNT_SID: z.string().min(1).optional(),
  TWILIO_AUTH_TOKEN: z.string().min(1).optional(),
  TWILIO_PHONE_NUMBER: z
    .string()
    .regex(/^\+\d{10,15}$/, 'Must be an E.164 phone number')
    .optional(),
  EMAIL_FROM: z.string().min(1).optional(),
  EMAIL_USER: z.string().min(1).optional(),
  EMAIL_PASSWORD: z.string().min(1).optional(),
  SMTP_HOST: z.string().min(1).default('smtp.gmail.com'),
  SMTP_PORT: numericString.default('587'),
  SMTP_SECURE: z.enum(['true', 'false']).optional(),
  VOICE_AGENT_ID: z.string().min(1).optional(),
  VOICE_STREAM_URL: z.string().url().default('wss://api.elevenlabs.io/v1/convai/conversation'),
});

export type IntakeConfig = z.infer<typeof intakeEnvSchema>;

export function loadIntakeConfig(source: NodeJS.ProcessEnv = process.env): IntakeConfig {
  try {
    return intakeEnvSchema.parse(source);
  } catch (error) {
    if (error instanceof z.ZodError) {
      const issueText = error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new Error(`Configuration errors: ${issueText}`);
    }

    throw error;
  }
}

export function displayTimezone(config: IntakeConfig): string {
  return config.DISPLAY_TIMEZONE ?? config.DEFAULT_TIMEZONE;
}

export function smtpSecure(config: IntakeConfig): boolean {
  if (config.SMTP_SECURE !== undefined) {
    return config.SMTP_SECURE === 'true';
  }

  return config.SMTP_PORT === 465;
}
