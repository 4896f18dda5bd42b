/**
 * Community Board
 *
 * In-memory discussion board scoped to one session: posts with attachment
 * metadata, substring search and anonymous comments. Nothing is persisted.
 *
 * @module services/community/board
 */

import { v4 as uuidv4 } from 'uuid';

import { ValidationError } from '../../utils/validation.js';

export interface Attachment {
  file_name: string;
  ext: string;
  size_bytes: number;
}

export interface Comment {
  author: string;
  text: string;
  created_at: string;
}

export interface CommunityPost {
  id: string;
  /** 1-based, in creation order */
  number: number;
  title: string;
  content: string;
  attachments: Attachment[];
  comments: Comment[];
  created_at: string;
}

export interface NewPost {
  title: string;
  content: string;
  attachments?: Attachment[];
}

/** Uniform draw in [0, 1) */
export type RandomSource = () => number;

/** Anonymous author label user_NNN, NNN in [100, 999] */
export function anonymousAuthor(random: RandomSource = Math.random): string {
  return `user_${100 + Math.floor(random() * 900)}`;
}

export class CommunityBoard {
  private readonly posts: CommunityPost[] = [];

  constructor(
    private readonly random: RandomSource = Math.random,
    private readonly now: () => Date = () => new Date()
  ) {}

  createPost(input: NewPost): CommunityPost {
    if (input.title.trim().length === 0 || input.content.trim().length === 0) {
      throw new ValidationError('Post title and content are required');
    }

    const post: CommunityPost = {
      id: uuidv4(),
      number: this.posts.length + 1,
      title: input.title,
      content: input.content,
      attachments: input.attachments ? [...input.attachments] : [],
      comments: [],
      created_at: this.now().toISOString(),
    };
    this.posts.push(post);
    return post;
  }

  /**
   * Posts whose title or content contains the query, ignoring case.
   * A blank query lists every post. Creation order is kept.
   */
  listPosts(query?: string): CommunityPost[] {
    const needle = query?.trim().toLowerCase() ?? '';
    if (!needle) return [...this.posts];
    return this.posts.filter(
      (post) => post.title.toLowerCase().includes(needle) || post.content.toLowerCase().includes(needle)
    );
  }

  getPost(id: string): CommunityPost | undefined {
    return this.posts.find((post) => post.id === id);
  }

  /** Returns undefined when the post does not exist */
  addComment(postId: string, text: string): Comment | undefined {
    if (text.trim().length === 0) {
      throw new ValidationError('Comment text is required');
    }

    const post = this.getPost(postId);
    if (!post) return undefined;

    const comment: Comment = {
      author: anonymousAuthor(this.random),
      text,
      created_at: this.now().toISOString(),
    };
    post.comments.push(comment);
    return comment;
  }

  get size(): number {
    return this.posts.length;
  }
}
