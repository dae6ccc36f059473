import { z } from 'zod';

/**
 * Characters used for the ASCII rendering when the event does not supply a
 * charset: digits, letters, punctuation and a trailing space.
 */
export const DEFAULT_CHARSET =
  '0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ!"#$%&\'()*+,-./:;<=>?@[\\]^_`{|}~ ';

/**
 * Payload delivered to the updater function by its EventBridge schedule.
 * Field names follow the rule input JSON.
 */
export const updaterEventSchema = z.object({
  key_name: z.string().min(1),
  repo_url: z.string().min(1),
  git_branch: z.string().min(1),
  temp_dir: z.string().min(1).default('/tmp'),
  ignore_regex: z.array(z.string()).default([]),
  ascii_art_num_columns: z.number().int().positive(),
  charset: z.string().min(1).default(DEFAULT_CHARSET),
  ignore_last_n_archive_links: z.number().int().nonnegative().default(0),
  s3_bucket: z.string().min(1),
  // Scheduled rules send an empty string when no test image is wanted
  test_url: z.union([z.literal('').transform(() => undefined), z.string().url()]).optional(),
  git_author: z.string().min(1),
  git_email: z.string().email()
});

export type UpdaterEvent = z.infer<typeof updaterEventSchema>;
export type UpdaterEventInput = z.input<typeof updaterEventSchema>;

export class InvalidEventError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid updater event: ${issues.join('; ')}`);
    this.name = 'InvalidEventError';
  }
}

/**
 * Formats zod issues as `path: message` strings.
 */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function parseUpdaterEvent(input: unknown): UpdaterEvent {
  const result = updaterEventSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidEventError(describeIssues(result.error));
  }
  return result.data;
}
