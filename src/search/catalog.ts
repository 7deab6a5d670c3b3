import { readFile } from 'node:fs/promises';
import { z, ZodError } from 'zod';
import type { Course } from './types';

const text = z.string().min(1, 'must be a non-empty string');
const optionalText = z
  .string()
  .nullish()
  .transform((v) => v ?? null);

export const lessonSchema = z.object({
  number: z.number().int('must be a non-negative integer').nonnegative('must be a non-negative integer'),
  title: text,
  link: optionalText,
  content: text
});

export const courseSchema = z.object({
  title: text,
  link: optionalText,
  instructor: optionalText,
  description: optionalText,
  lessons: z.array(lessonSchema)
});

export const catalogSchema = z
  .array(courseSchema, { invalid_type_error: 'course catalog must be an array' })
  .superRefine((courses, ctx) => {
    const seen = new Set<string>();
    courses.forEach((course, i) => {
      if (seen.has(course.title)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate course title '${course.title}'`,
          path: [i, 'title']
        });
      }
      seen.add(course.title);
    });
  });

function describe(error: ZodError): string {
  return error.issues
    .map((issue) => {
      if (issue.path.length === 0) return issue.message;
      const where = issue.path.map((p) => (typeof p === 'number' ? `[${p}]` : `.${p}`)).join('');
      return `courses${where}: ${issue.message}`;
    })
    .join('; ');
}

export function parseCatalog(raw: unknown): Course[] {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) throw new Error(`invalid course catalog: ${describe(parsed.error)}`);
  return parsed.data;
}

export async function loadCatalog(path: string): Promise<Course[]> {
  const content = await readFile(path, 'utf8');
  return parseCatalog(JSON.parse(content));
}
