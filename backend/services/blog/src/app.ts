// backend/services/blog/src/app.ts
/**
 * Purpose:
 * - Compose the blog: one PostRepo, two resources over it, one dispatcher,
 *   and the shared Express stack around them.
 *
 * Notes:
 * - Router order is dispatch order. `post` comes first; neither resource
 *   can match the other's paths, so the order only shows up in logs.
 */

import type { Express } from "express";
import {
  App,
  EjsTemplateEngine,
  createServiceApp,
  type Callable,
} from "../../shared/src";
import { PostRepo, type Post } from "./repo/postRepo";
import seed from "./repo/seed.json";
import { postRoutes } from "./resources/post";
import { blogPostRoutes } from "./resources/blogPost";

export interface BlogAppOptions {
  serviceName: string;
  viewsDir: string;
  templateCache?: boolean;
  /** Defaults to the bundled seed posts. */
  repo?: PostRepo;
  httpLogging?: boolean;
}

export interface BlogApp {
  app: Express;
  dispatcher: Callable;
  repo: PostRepo;
}

export function seedPosts(): Array<Omit<Post, "id">> {
  return seed.map((p) => ({ ...p }));
}

export function buildBlogApp(opts: BlogAppOptions): BlogApp {
  const repo = opts.repo ?? new PostRepo(seedPosts());
  const templates = new EjsTemplateEngine({
    viewsDir: opts.viewsDir,
    cache: opts.templateCache,
    service: opts.serviceName,
  });

  const dispatcher = new App(
    [postRoutes(repo, templates), blogPostRoutes(repo, templates)],
    { service: opts.serviceName }
  );

  const app = createServiceApp({
    serviceName: opts.serviceName,
    dispatcher,
    httpLogging: opts.httpLogging,
  });

  return { app, dispatcher, repo };
}
