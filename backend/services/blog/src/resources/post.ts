// backend/services/blog/src/resources/post.ts
/**
 * Post resource: every post, drafts included.
 *
 *   /post/new   → PostDraft(params)       new.html.ejs
 *   /post/:id   → repo.findById(id)       show.html.ejs
 *   /post       → repo.all()              index.html.ejs
 */

import {
  construct,
  handler,
  routes,
  variadic,
  type ResourceDefinition,
  type Router,
  type TemplateEngine,
} from "../../../shared/src";
import { PostDraft } from "../repo/postDraft";
import type { PostRepo } from "../repo/postRepo";
import { PostPresenter, PostsPresenter } from "../presenters/postPresenters";

export function postResource(repo: PostRepo): ResourceDefinition {
  return {
    name: "Post",
    Record: {
      find_by_id: handler(["id"], (id: number) => repo.findById(id)),
      initialize: construct(["params"], PostDraft),
      all: variadic(() => repo.all()),
    },
    PresentsOne: PostPresenter,
    PresentsMany: PostsPresenter,
  };
}

export function postRoutes(repo: PostRepo, templates: TemplateEngine): Router {
  return routes(
    postResource(repo),
    (r) => {
      r.new();
      r.show();
      r.index();
    },
    { templates }
  );
}
