import { z } from 'zod';
import { WEEKDAYS, isTimeZone, parseWeekday } from '../contacts/rota.js';

const nonEmpty = z.string().trim().min(1);

const httpUrl = z
  .string()
  .trim()
  .url()
  .refine((value) => /^https?:\/\//.test(value), { message: 'must be an http(s) URL' });

const seconds = z.number().positive();

/** `[loop]`, mandatory. Loop is also the credential source for loop sinks. */
export const LoopSectionSchema = z.object({
  url: httpUrl,
  token: nonEmpty,
  /** Loop user group whose members are on duty. */
  schedule: nonEmpty,
  /** Sent as X-Loop-Team when set. */
  team: z.string().trim().min(1).optional(),
  /** Wall clock the `[schedule]` rota is read in. */
  timezone: z
    .string()
    .trim()
    .refine(isTimeZone, { message: 'must be an IANA time zone' })
    .default('UTC'),
  poll_interval_seconds: seconds.default(60),
  timeout_seconds: seconds.default(30),
});

/**
 * `[oncall]`, optional. url, token and schedule are given together or not
 * at all; the loader turns an all-empty table into "not configured".
 */
export const OnCallSectionSchema = z
  .object({
    url: z.string().trim().optional(),
    token: z.string().trim().optional(),
    /** Schedule name or id. */
    schedule: z.string().trim().optional(),
    poll_interval_seconds: seconds.default(60),
    timeout_seconds: seconds.default(30),
  })
  .superRefine((section, ctx) => {
    const fields = ['url', 'token', 'schedule'] as const;
    const present = fields.filter((key) => Boolean(section[key]));
    if (present.length === 0 || present.length === fields.length) {
      if (section.url && !/^https?:\/\//.test(section.url)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['url'], message: 'must be an http(s) URL' });
      }
      return;
    }
    for (const key of fields) {
      if (!section[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: `is required when [oncall] sets ${present.join(', ')}`,
        });
      }
    }
  });

const RetryFields = {
  max_attempts: z.number().int().min(1).max(20).default(5),
  base_delay_ms: z.number().int().min(0).default(500),
  max_delay_ms: z.number().int().min(0).default(30_000),
  timeout_seconds: seconds.default(10),
  /** Provider ids this sink listens to. Omit to receive every provider. */
  providers: z.array(nonEmpty).optional(),
};

const SinkSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('webhook'),
    /** Supports ${ENV_VAR} syntax. */
    url: nonEmpty,
    ...RetryFields,
  }),
  z.object({
    type: z.literal('slack'),
    /** Slack incoming webhook URL. Supports ${ENV_VAR} syntax. */
    url: nonEmpty,
    channel: z.string().optional(),
    ...RetryFields,
  }),
  z.object({
    type: z.literal('loop'),
    /** Loop channel id to post into. */
    channel: nonEmpty,
    ...RetryFields,
  }),
  z.object({
    type: z.literal('loop-group'),
    /** Loop user group kept in sync with the person on duty. */
    group: nonEmpty,
    keep_usernames: z.array(nonEmpty).default([]),
    ...RetryFields,
  }),
  z.object({
    type: z.literal('log'),
    file: nonEmpty,
    ...RetryFields,
  }),
]);

export type SinkSection = z.infer<typeof SinkSchema>;

const ContactSchema = z.object({
  ldap: nonEmpty,
  full_name: nonEmpty,
  /** Other identifiers providers may report for this person. */
  aliases: z.array(nonEmpty).default([]),
});

/** `[schedule]`: weekday name → contact key. */
const ScheduleSchema = z.record(z.string(), nonEmpty);

export const DutyConfigSchema = z
  .object({
    loop: LoopSectionSchema,
    oncall: OnCallSectionSchema.optional(),
    server: z
      .object({
        host: z.string().trim().min(1).default('0.0.0.0'),
        port: z.number().int().min(0).max(65_535).default(8080),
      })
      .default({}),
    reconciler: z
      .object({
        cycle_margin_seconds: z.number().min(0).default(5),
        notify_initial: z.boolean().default(false),
        shutdown_grace_seconds: z.number().min(0).default(10),
      })
      .default({}),
    notifications: z
      .object({
        drain_timeout_seconds: z.number().min(0).default(15),
        concurrency: z.number().int().min(1).default(4),
        sinks: z.array(SinkSchema).default([]),
      })
      .default({}),
    contacts: z.record(z.string(), ContactSchema).default({}),
    schedule: ScheduleSchema.optional(),
    logging: z
      .object({
        level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        dir: z.string().trim().min(1).optional(),
      })
      .default({}),
  })
  .superRefine((doc, ctx) => {
    for (const [day, key] of Object.entries(doc.schedule ?? {})) {
      if (!parseWeekday(day)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['schedule', day],
          message: `is not a weekday (expected one of ${WEEKDAYS.join(', ')})`,
        });
      }
      if (!Object.hasOwn(doc.contacts, key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['schedule', day],
          message: `unknown contact "${key}"`,
        });
      }
    }
  });

export type DutyConfigDocument = z.infer<typeof DutyConfigSchema>;
