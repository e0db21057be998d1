import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  chunkText,
  extractTitle,
  htmlToText,
  loadGithubRepoDocuments,
  loadSitemapDocuments,
  parseRepoReference,
  parseSitemap,
} from "../knowledgebase/loaders";
import { ValidationError } from "../utils/errorHandler";
import { jsonResponse, routeFetch } from "./helpers/fetch";

const PAGE_HTML = `<html><head><title>Docs &amp; Guides</title><style>p { color: red; }</style></head>
<body><p>Hello&nbsp;<b>world</b></p><script>track()</script></body></html>`;

describe("parseSitemap", () => {
  it("returns unique, decoded <loc> values in order", () => {
    const xml = `<?xml version="1.0"?>
<urlset>
  <url><loc>https://docs.test/a?x=1&amp;y=2</loc></url>
  <url><loc> https://docs.test/b </loc></url>
  <url><loc>https://docs.test/b</loc></url>
</urlset>`;

    expect(parseSitemap(xml)).toEqual(["https://docs.test/a?x=1&y=2", "https://docs.test/b"]);
  });
});

describe("html helpers", () => {
  it("extracts the title", () => {
    expect(extractTitle(PAGE_HTML)).toBe("Docs & Guides");
    expect(extractTitle("<p>no title</p>")).toBeUndefined();
  });

  it("reduces html to text without scripts or styles", () => {
    expect(htmlToText(PAGE_HTML)).toBe("Docs & Guides Hello world");
  });
});

describe("chunkText", () => {
  it("splits into overlapping windows", () => {
    expect(chunkText("abcdefghij", 4, 1)).toEqual(["abcd", "defg", "ghij"]);
  });

  it("returns a single chunk for short text and none for blank text", () => {
    expect(chunkText("abc", 4, 1)).toEqual(["abc"]);
    expect(chunkText("   ", 4, 1)).toEqual([]);
  });

  it("rejects an overlap that is not smaller than the size", () => {
    expect(() => chunkText("abc", 4, 4)).toThrow(ValidationError);
  });
});

describe("loadSitemapDocuments", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("loads every reachable page and skips failures", async () => {
    const fetchImpl = routeFetch({
      "https://docs.test/sitemap.xml": () =>
        new Response("<urlset><url><loc>https://docs.test/a</loc></url><url><loc>https://docs.test/gone</loc></url></urlset>"),
      "https://docs.test/a": () => new Response(PAGE_HTML),
    });

    const documents = await loadSitemapDocuments("https://docs.test/sitemap.xml", fetchImpl);

    expect(documents).toEqual([
      { source: "https://docs.test/a", title: "Docs & Guides", text: "Docs & Guides Hello world" },
    ]);
    expect(fetchImpl).toHaveBeenCalledTimes(3);
  });

  it("fails when the sitemap itself cannot be fetched", async () => {
    const fetchImpl = routeFetch({});

    await expect(loadSitemapDocuments("https://docs.test/sitemap.xml", fetchImpl)).rejects.toThrow(
      "docs.test error: GET https://docs.test/sitemap.xml failed: 404",
    );
  });
});

describe("parseRepoReference", () => {
  it("accepts owner/repo and github URLs", () => {
    expect(parseRepoReference("acme/handbook")).toEqual({ owner: "acme", repo: "handbook" });
    expect(parseRepoReference("https://github.com/acme/handbook.git")).toEqual({ owner: "acme", repo: "handbook" });
    expect(parseRepoReference("https://github.com/acme/handbook/")).toEqual({ owner: "acme", repo: "handbook" });
  });

  it("rejects anything else", () => {
    expect(() => parseRepoReference("acme")).toThrow(ValidationError);
    expect(() => parseRepoReference("acme/handbook/tree/main")).toThrow(ValidationError);
  });
});

describe("loadGithubRepoDocuments", () => {
  it("loads documentation files from the default branch", async () => {
    const fetchImpl = routeFetch({
      "https://api.github.com/repos/acme/handbook": () => jsonResponse({ default_branch: "main" }),
      "https://api.github.com/repos/acme/handbook/git/trees/main?recursive=1": () =>
        jsonResponse({
          tree: [
            { path: "README.md", type: "blob" },
            { path: "src/index.ts", type: "blob" },
            { path: "docs", type: "tree" },
            { path: "docs/setup.rst", type: "blob" },
          ],
        }),
      "https://raw.githubusercontent.com/acme/handbook/main/README.md": () => new Response("# Handbook\nWelcome"),
      "https://raw.githubusercontent.com/acme/handbook/main/docs/setup.rst": () => new Response("Setup\n=====\n"),
    });

    const documents = await loadGithubRepoDocuments("acme/handbook", { token: "test-token", fetchImpl });

    expect(documents).toEqual([
      {
        source: "https://github.com/acme/handbook/blob/main/README.md",
        title: "acme/handbook: README.md",
        text: "# Handbook\nWelcome",
      },
      {
        source: "https://github.com/acme/handbook/blob/main/docs/setup.rst",
        title: "acme/handbook: docs/setup.rst",
        text: "Setup\n=====",
      },
    ]);
    const apiCall = fetchImpl.mock.calls[0];
    expect(apiCall[1]?.headers).toMatchObject({ Authorization: "Bearer test-token" });
  });
});
