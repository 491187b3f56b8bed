import { describe, expect, it } from "vitest";
import { populateTemplate } from "../src/render/template";
import { RenderFailed } from "../src/errors";

describe("populateTemplate", () => {
  it("replaces every occurrence of each placeholder", () => {
    const output = populateTemplate("<h1>{{title}}</h1><p>{{title}} by {{owner}}</p>", {
      title: "Agreement",
      owner: "Commerce"
    });
    expect(output).toBe("<h1>Agreement</h1><p>Agreement by Commerce</p>");
  });

  it("renders missing values as Undefined", () => {
    expect(populateTemplate("Owner: {{owner}}", { owner: null })).toBe("Owner: Undefined");
  });

  it("does not expand placeholders that appear inside substituted values", () => {
    const output = populateTemplate("{{a}}|{{b}}", { a: "{{b}}", b: "x" });
    expect(output).toBe("{{b}}|x");
  });

  it("rejects keys the template does not contain", () => {
    expect(() => populateTemplate("{{a}}", { a: "1", extra: "2" }, "page template")).toThrow(
      "Key {{extra}} not found in page template"
    );
  });

  it("rejects placeholders that were not supplied", () => {
    expect(() => populateTemplate("{{a}} {{b}}", { a: "1" })).toThrow(RenderFailed);
    expect(() => populateTemplate("{{a}} {{b}}", { a: "1" })).toThrow(
      "Unmatched variables found in template: {{b}}"
    );
  });
});
