export interface Lesson {
  number: number;
  title: string;
  link: string | null;
  content: string;
}

export interface Course {
  title: string;
  link: string | null;
  instructor: string | null;
  description: string | null;
  lessons: Lesson[];
}

export interface CourseOutline {
  title: string;
  link: string | null;
  instructor: string | null;
  lessons: Array<Pick<Lesson, 'number' | 'title' | 'link'>>;
}

export interface SearchQuery {
  query: string;
  courseTitle?: string;
  lessonNumber?: number;
  limit?: number;
}

export interface SearchHit {
  courseTitle: string;
  lessonNumber: number | null;
  link: string | null;
  content: string;
  score: number;
}

// Boundary the course tools search through; ranking and indexing stay behind it.
export interface VectorStore {
  search(query: SearchQuery): Promise<SearchHit[]>;
  resolveCourse(name: string): Promise<string | null>;
  getCourseOutline(name: string): Promise<CourseOutline | null>;
  listCourseTitles(): Promise<string[]>;
}
