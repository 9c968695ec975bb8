// backend/services/blog/src/repo/postRepo.ts
/**
 * In-memory post store. Stands in for a real persistence layer; the routing
 * core only ever sees the Record handlers built on top of it.
 */

export interface Post {
  id: number;
  title: string;
  body: string;
  author: string;
  published: boolean;
}

export class PostNotFound extends Error {
  public readonly status = 404;

  constructor(public readonly id: number) {
    super(`Post ${id} not found`);
    this.name = "PostNotFound";
  }
}

export class PostRepo {
  readonly #posts = new Map<number, Post>();
  #nextId = 1;

  constructor(seed: ReadonlyArray<Omit<Post, "id">> = []) {
    for (const p of seed) this.insert(p);
  }

  public insert(input: Omit<Post, "id">): Post {
    const post: Post = { ...input, id: this.#nextId++ };
    this.#posts.set(post.id, post);
    return post;
  }

  public findById(id: number): Post {
    const found = this.#posts.get(id);
    if (!found) throw new PostNotFound(id);
    return found;
  }

  /** Drafts are treated as absent. */
  public findPublished(id: number): Post {
    const found = this.findById(id);
    if (!found.published) throw new PostNotFound(id);
    return found;
  }

  public all(): Post[] {
    return [...this.#posts.values()];
  }

  public published(): Post[] {
    return this.all().filter((p) => p.published);
  }

  public search(term: string): Post[] {
    const needle = term.trim().toLowerCase();
    if (!needle) return this.published();
    return this.published().filter(
      (p) =>
        p.title.toLowerCase().includes(needle) ||
        p.body.toLowerCase().includes(needle)
    );
  }
}
