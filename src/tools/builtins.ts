import { z } from 'zod';
import type { SourceRef } from '../core/context';
import { ToolArgumentError } from '../core/errors';
import type { SearchHit, VectorStore } from '../search/types';
import type { ToolManager } from './executor';
import type { ToolDefinition, ToolHandler, ToolOutput } from './registry';

export const SEARCH_TOOL = 'search_course_content';
export const OUTLINE_TOOL = 'get_course_outline';

export const searchDefinition: ToolDefinition = {
  name: SEARCH_TOOL,
  description: 'Search course materials with smart course name matching and lesson filtering',
  inputSchema: {
    type: 'object',
    properties: {
      query: { type: 'string', description: 'What to search for in the course content' },
      course_name: { type: 'string', description: "Course title (partial matches work, e.g. 'MCP', 'Intro')" },
      lesson_number: { type: 'integer', description: 'Specific lesson number to search within (e.g. 1, 2, 3)' }
    },
    required: ['query']
  }
};

export const outlineDefinition: ToolDefinition = {
  name: OUTLINE_TOOL,
  description: 'Get the outline of a course: title, link and the numbered list of lessons',
  inputSchema: {
    type: 'object',
    properties: {
      course_name: { type: 'string', description: 'Course title (partial matches work)' }
    },
    required: ['course_name']
  }
};

const nonEmpty = (key: string) => {
  const message = `'${key}' is required and must be a non-empty string`;
  return z
    .string({ required_error: message, invalid_type_error: message })
    .refine((v) => v.trim().length > 0, message);
};

const optionalString = (key: string) =>
  z
    .string({ invalid_type_error: `'${key}' must be a string` })
    .nullish()
    .transform((v) => v ?? undefined);

// models sometimes send numbers as strings
const optionalLesson = (key: string) => {
  const message = `'${key}' must be a non-negative integer`;
  return z.preprocess(
    (v) => (v === null ? undefined : typeof v === 'string' ? Number(v) : v),
    z.number({ invalid_type_error: message }).int(message).nonnegative(message).optional()
  );
};

export const searchArgs = z.object({
  query: nonEmpty('query'),
  course_name: optionalString('course_name'),
  lesson_number: optionalLesson('lesson_number')
});

export const outlineArgs = z.object({
  course_name: nonEmpty('course_name')
});

function parseArgs<S extends z.ZodTypeAny>(schema: S, args: Record<string, unknown>): z.output<S> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new ToolArgumentError(parsed.error.issues[0]?.message ?? 'invalid arguments');
  }
  return parsed.data;
}

function hitLabel(hit: SearchHit): string {
  return hit.lessonNumber === null ? hit.courseTitle : `${hit.courseTitle} - Lesson ${hit.lessonNumber}`;
}

function notFound(courseName: string): string {
  return `No course found matching '${courseName}'.`;
}

export function createSearchHandler(store: VectorStore, limit?: number): ToolHandler {
  return async (args): Promise<ToolOutput> => {
    const { query, course_name: courseName, lesson_number: lessonNumber } = parseArgs(searchArgs, args);

    let courseTitle: string | undefined;
    if (courseName !== undefined) {
      const resolved = await store.resolveCourse(courseName);
      if (resolved === null) return notFound(courseName);
      courseTitle = resolved;
    }

    const hits = await store.search({ query, courseTitle, lessonNumber, limit });
    if (hits.length === 0) {
      let msg = 'No relevant content found';
      if (courseName !== undefined) msg += ` in course '${courseName}'`;
      if (lessonNumber !== undefined) msg += ` in lesson ${lessonNumber}`;
      return `${msg}.`;
    }

    const sources: SourceRef[] = hits.map((h) => ({ title: hitLabel(h), url: h.link }));
    const content = hits.map((h) => `[${hitLabel(h)}]\n${h.content}`).join('\n\n');
    return { content, sources };
  };
}

export function createOutlineHandler(store: VectorStore): ToolHandler {
  return async (args): Promise<ToolOutput> => {
    const { course_name: courseName } = parseArgs(outlineArgs, args);
    const outline = await store.getCourseOutline(courseName);
    if (!outline) return notFound(courseName);

    const lines = [`Course: ${outline.title}`];
    if (outline.link) lines.push(`Link: ${outline.link}`);
    if (outline.instructor) lines.push(`Instructor: ${outline.instructor}`);
    lines.push(`Lessons (${outline.lessons.length}):`);
    for (const lesson of outline.lessons) {
      lines.push(`${lesson.number}. ${lesson.title}`);
    }
    return { content: lines.join('\n'), sources: [{ title: outline.title, url: outline.link }] };
  };
}

export function registerCourseTools(tools: ToolManager, store: VectorStore, limit?: number) {
  tools.register(searchDefinition, createSearchHandler(store, limit));
  tools.register(outlineDefinition, createOutlineHandler(store));
}
