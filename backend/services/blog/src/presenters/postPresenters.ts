// backend/services/blog/src/presenters/postPresenters.ts

import type { Post } from "../repo/postRepo";

export class PostPresenter {
  constructor(private readonly post: Post) {}

  get id(): number {
    return this.post.id;
  }

  get title(): string {
    return this.post.title;
  }

  get body(): string {
    return this.post.body;
  }

  get author(): string {
    return this.post.author;
  }

  get byline(): string {
    return `by ${this.post.author}`;
  }

  get status(): string {
    return this.post.published ? "published" : "draft";
  }

  /** Excerpt of at most `max` characters, cut on a word boundary. */
  excerpt(max = 24): string {
    const body = this.post.body;
    if (body.length <= max) return body;
    // One char past `max` so a cut landing on a word end keeps that word.
    const lastSpace = body.slice(0, max + 1).lastIndexOf(" ");
    return `${lastSpace > 0 ? body.slice(0, lastSpace) : body.slice(0, max)}...`;
  }
}

export class PostsPresenter {
  public readonly posts: PostPresenter[];

  constructor(posts: Post[]) {
    this.posts = posts.map((p) => new PostPresenter(p));
  }

  get count(): number {
    return this.posts.length;
  }

  get empty(): boolean {
    return this.posts.length === 0;
  }
}
