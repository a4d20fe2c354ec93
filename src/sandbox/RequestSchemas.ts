import { z } from 'zod';
import { InvalidRequestError } from './ErrorHandling.js';
import { USER_ID_PATTERN } from './SandboxRegistry.js';

export const MAX_CONTENT_BYTES = 1024 * 1024;
export const MAX_PACKAGES = 20;
export const PACKAGE_SPEC_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._\-[\],=<>!~]*$/;

const FENCED_BLOCK = /^```(?:[\w+-]*[ \t]*\r?\n)?([\s\S]*?)```$/;
const INLINE_CODE = /^`([^`]+)`$/;

/**
 * Unwrap a message sent entirely as a fenced block (with an optional language line)
 * or a single inline code span. Anything else is returned trimmed.
 */
export function extractCodeBlock(text: string): string {
  const trimmed = text.trim();
  const fenced = FENCED_BLOCK.exec(trimmed);
  if (fenced) {
    return fenced[1].trim();
  }
  const inline = INLINE_CODE.exec(trimmed);
  if (inline) {
    return inline[1].trim();
  }
  return trimmed;
}

export const UserIdSchema = z
  .string()
  .regex(USER_ID_PATTERN, 'User id must be 1-64 letters, digits, "_" or "-"');

const RelativePathSchema = z.string().max(4096).optional();

export const CreateRequestSchema = z.object({ userId: UserIdSchema });

export const InfoRequestSchema = z.object({ userId: UserIdSchema });

/** Run parameters as sent; the code is unwrapped once, by the service */
export const RunParamsSchema = z.object({
  userId: UserIdSchema,
  code: z.string(),
  workdir: RelativePathSchema,
});

export const RunRequestSchema = RunParamsSchema.extend({
  code: z
    .string()
    .transform(extractCodeBlock)
    .pipe(z.string().min(1, 'Code must not be empty')),
});

export const ListRequestSchema = z.object({
  userId: UserIdSchema,
  path: RelativePathSchema,
  page: z.number().int().min(1).default(1),
});

export const WriteRequestSchema = z.object({
  userId: UserIdSchema,
  path: z.string().min(1, 'Path must not be empty').max(4096),
  content: z
    .string()
    .refine((content) => Buffer.byteLength(content, 'utf-8') <= MAX_CONTENT_BYTES, {
      message: `Content must be at most ${MAX_CONTENT_BYTES} bytes`,
    }),
});

export const RemoveRequestSchema = z.object({
  userId: UserIdSchema,
  path: z.string().min(1, 'Path must not be empty').max(4096),
  recursive: z.boolean().default(false),
});

export const InstallRequestSchema = z.object({
  userId: UserIdSchema,
  packages: z
    .array(
      z
        .string()
        .trim()
        .max(100)
        .regex(PACKAGE_SPEC_PATTERN, 'Invalid package specifier'),
    )
    .min(1, 'At least one package is required')
    .max(MAX_PACKAGES),
});

export const DeleteRequestSchema = z.object({ userId: UserIdSchema });

export const CancelRequestSchema = z.object({ userId: UserIdSchema });

/**
 * Validate `input` against `schema`, converting zod failures to InvalidRequestError
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw InvalidRequestError.fromZod(parsed.error);
  }
  return parsed.data;
}
