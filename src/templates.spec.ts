import { join } from "node:path";

import {
  fileTemplateSource,
  memoryTemplateSource,
  renderString,
  TemplateEngine,
} from "./templates";

const templateDir = join(__dirname, "..", "templates");

describe("renderString", () => {
  it("should substitute variables", () => {
    const template = "Hello {{ name }}! You have {{count}} items.";

    expect(renderString(template, { name: "Ann", count: 3 })).toBe(
      "Hello Ann! You have 3 items."
    );
  });

  it("should leave a placeholder for missing variables", () => {
    expect(renderString("Hi {{name}}", {})).toBe("Hi {{ name }}");
  });

  it("should expand for loops", () => {
    const template =
      "<ul>{% for u in users %}<li>{{ u }}</li>{% endfor %}</ul>";

    expect(renderString(template, { users: ["a", "b"] })).toBe(
      "<ul><li>a</li><li>b</li></ul>"
    );
  });

  it("should mark a missing loop list with a comment", () => {
    const template =
      "<ul>{% for u in users %}<li>{{ u }}</li>{% endfor %}</ul>";

    expect(renderString(template, {})).toBe(
      "<ul><!-- List 'users' not found in context --></ul>"
    );
  });

  it("should mark a loop over something that is not a list", () => {
    const template = "{% for u in users %}{{ u }}{% endfor %}";

    expect(renderString(template, { users: 4 })).toBe(
      "<!-- 'users' is not a list -->"
    );
  });
});

describe("TemplateEngine", () => {
  it("should render templates from memory", async () => {
    const engine = new TemplateEngine(
      memoryTemplateSource({ "a.html": "<b>{{ x }}</b>" })
    );

    expect(await engine.render("a.html", { x: 1 })).toBe("<b>1</b>");
  });

  it("should report templates that do not exist", async () => {
    const engine = new TemplateEngine(memoryTemplateSource({}));

    expect(await engine.render("nope.html")).toBe(
      "<h1>Template Error</h1><p>Template 'nope.html' not found</p>"
    );
  });

  it("should render templates from disk", async () => {
    const engine = new TemplateEngine(fileTemplateSource(templateDir));

    const html = await engine.render("users.html", {
      users: ["Ann", "Ben"],
      user_count: 2,
    });

    expect(html).toContain("    <li>Ann</li>\n");
    expect(html).toContain("    <li>Ben</li>\n");
    expect(html).toContain("<p>Total: 2 users</p>");
  });
});

describe("fileTemplateSource", () => {
  it("should not load files outside its directory", async () => {
    const source = fileTemplateSource(templateDir);

    expect(await source.load("../package.json")).toBeUndefined();
  });

  it("should return undefined for missing files", async () => {
    const source = fileTemplateSource(templateDir);

    expect(await source.load("missing.html")).toBeUndefined();
  });
});
