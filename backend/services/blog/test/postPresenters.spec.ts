// backend/services/blog/test/postPresenters.spec.ts
import { describe, it, expect } from "vitest";
import { PostPresenter, PostsPresenter } from "../src/presenters/postPresenters";
import { PostDraft } from "../src/repo/postDraft";

const post = {
  id: 1,
  title: "Hello routes",
  body: "Paths become handler calls.",
  author: "ada",
  published: true,
};

describe("PostPresenter", () => {
  const p = new PostPresenter(post);

  it("derives byline and status", () => {
    expect(p.byline).toBe("by ada");
    expect(p.status).toBe("published");
    expect(new PostPresenter({ ...post, published: false }).status).toBe("draft");
  });

  it("cuts excerpts on a word boundary", () => {
    expect(p.excerpt()).toBe("Paths become handler...");
    expect(p.excerpt(12)).toBe("Paths become...");
    expect(p.excerpt(3)).toBe("Pat...");
    expect(p.excerpt(100)).toBe("Paths become handler calls.");
  });
});

describe("PostsPresenter", () => {
  it("wraps every post", () => {
    const many = new PostsPresenter([post, { ...post, id: 2 }]);
    expect(many.count).toBe(2);
    expect(many.empty).toBe(false);
    expect(many.posts[1].id).toBe(2);
    expect(new PostsPresenter([]).empty).toBe(true);
  });
});

describe("PostDraft", () => {
  it("prefills string params only", () => {
    const draft = new PostDraft({ title: "Draft one", author: 5 });
    expect(draft).toMatchObject({ id: 0, title: "Draft one", author: "", published: false });
  });
});
