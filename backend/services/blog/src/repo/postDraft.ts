// backend/services/blog/src/repo/postDraft.ts

import type { Post } from "./postRepo";

/** The `new` form: an unsaved post prefilled from request params. */
export class PostDraft implements Post {
  public readonly id = 0;
  public readonly title: string;
  public readonly body = "";
  public readonly author: string;
  public readonly published = false;

  constructor(params: Readonly<Record<string, unknown>>) {
    this.title = typeof params.title === "string" ? params.title : "";
    this.author = typeof params.author === "string" ? params.author : "";
  }
}
