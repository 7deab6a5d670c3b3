import type { Course, CourseOutline, SearchHit, SearchQuery, VectorStore } from './types';

type Chunk = {
  courseTitle: string;
  lessonNumber: number | null;
  link: string | null;
  content: string;
  words: string[];
};

const MIN_TERM_LENGTH = 3;

export function terms(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((w) => w.length >= MIN_TERM_LENGTH);
}

function paragraphs(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

/**
 * Keyword index over a course catalog. Each paragraph of a course description
 * or lesson is one chunk; a chunk scores one point per occurrence of a query
 * term and ties keep catalog order.
 */
export class InMemoryVectorStore implements VectorStore {
  private courses: Course[];
  private chunks: Chunk[] = [];

  constructor(courses: Course[], private defaultLimit = 5) {
    this.courses = [...courses];
    for (const course of this.courses) {
      if (course.description) {
        for (const content of paragraphs(course.description)) {
          this.chunks.push({ courseTitle: course.title, lessonNumber: null, link: course.link, content, words: terms(content) });
        }
      }
      for (const lesson of course.lessons) {
        for (const content of paragraphs(lesson.content)) {
          this.chunks.push({
            courseTitle: course.title,
            lessonNumber: lesson.number,
            link: lesson.link ?? course.link,
            content,
            words: terms(content)
          });
        }
      }
    }
  }

  async search(query: SearchQuery): Promise<SearchHit[]> {
    const wanted = new Set(terms(query.query));
    const limit = query.limit ?? this.defaultLimit;
    const hits: SearchHit[] = [];
    for (const chunk of this.chunks) {
      if (query.courseTitle !== undefined && chunk.courseTitle !== query.courseTitle) continue;
      if (query.lessonNumber !== undefined && chunk.lessonNumber !== query.lessonNumber) continue;
      const score = chunk.words.filter((w) => wanted.has(w)).length;
      if (score === 0) continue;
      hits.push({
        courseTitle: chunk.courseTitle,
        lessonNumber: chunk.lessonNumber,
        link: chunk.link,
        content: chunk.content,
        score
      });
    }
    // Array.prototype.sort is stable, so equal scores stay in catalog order.
    return hits.sort((a, b) => b.score - a.score).slice(0, limit);
  }

  async resolveCourse(name: string): Promise<string | null> {
    const needle = name.trim().toLowerCase();
    if (needle.length === 0) return null;
    const exact = this.courses.find((c) => c.title.toLowerCase() === needle);
    if (exact) return exact.title;
    const partial = this.courses.find((c) => c.title.toLowerCase().includes(needle));
    return partial ? partial.title : null;
  }

  async getCourseOutline(name: string): Promise<CourseOutline | null> {
    const title = await this.resolveCourse(name);
    const course = this.courses.find((c) => c.title === title);
    if (!course) return null;
    return {
      title: course.title,
      link: course.link,
      instructor: course.instructor,
      lessons: course.lessons.map(({ number, title: lessonTitle, link }) => ({ number, title: lessonTitle, link }))
    };
  }

  async listCourseTitles(): Promise<string[]> {
    return this.courses.map((c) => c.title);
  }
}
