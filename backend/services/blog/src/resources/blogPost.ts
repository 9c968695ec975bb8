// backend/services/blog/src/resources/blogPost.ts
/**
 * BlogPost resource: the public, published-only view of the same store.
 *
 *   /blog_post/search?q=   → repo.search(params.q)   index.html.ejs
 *   /blog_post/:id         → repo.findPublished(id)  show.html.ejs
 *   /blog_post/:id/preview → repo.findPublished(id)  preview.html.ejs
 *   /blog_post             → repo.published()        index.html.ejs
 */

import {
  handler,
  routes,
  variadic,
  type RequestParams,
  type ResourceDefinition,
  type Router,
  type TemplateEngine,
} from "../../../shared/src";
import type { PostRepo } from "../repo/postRepo";
import { PostPresenter, PostsPresenter } from "../presenters/postPresenters";

function searchTerm(params: RequestParams): string {
  const q = params.q;
  return typeof q === "string" ? q : "";
}

export function blogPostResource(repo: PostRepo): ResourceDefinition {
  return {
    name: "Blog::BlogPost",
    Record: {
      find_by_id: handler(["id"], (id: number) => repo.findPublished(id)),
      published: variadic(() => repo.published()),
      search: handler(["params"], (params: RequestParams) =>
        repo.search(searchTerm(params))
      ),
    },
    PresentsOne: PostPresenter,
    PresentsMany: PostsPresenter,
  };
}

export function blogPostRoutes(repo: PostRepo, templates: TemplateEngine): Router {
  return routes(
    blogPostResource(repo),
    (r) => {
      r.route("/blog_post/search", "Record.search", "index");
      r.show();
      r.route("/blog_post/:id/preview", "Record.find_by_id", "preview");
      r.index("Record.published");
    },
    { templates }
  );
}
