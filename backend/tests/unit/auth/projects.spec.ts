import { describe, expect, it } from "vitest";
import { deriveAuthorizationState, normalizeProjects } from "../../../src/auth/projects";
import { silentLogger } from "../../helpers";

const log = silentLogger();

describe("normalizeProjects", () => {
  const shaped = {
    "staff.portal": {
      name: "Technical Staff",
      resources: [
        { name: "portal.notebooks.shared", username: "fun.staff" },
        { name: "portal.clusters.shared", username: "fun.staff" }
      ]
    }
  };

  it("passes an object through unchanged", () => {
    expect(normalizeProjects({ projects: shaped }, log)).toEqual(shaped);
  });

  it("decodes a JSON-encoded object", () => {
    const projects = { "bench.portal": { resources: [{ name: "bench.notebooks", username: "user1" }] } };

    expect(normalizeProjects({ projects: JSON.stringify(projects) }, log)).toEqual(projects);
  });

  it.each([
    ["absent", {}],
    ["null", { projects: null }],
    ["empty object", { projects: {} }],
    ["invalid JSON", { projects: "{invalid_json" }],
    ["bare word", { projects: "invalid_json" }],
    ["JSON-encoded array", { projects: JSON.stringify([{ name: "test.resource" }]) }],
    ["raw array", { projects: [{ name: "test.resource" }] }],
    ["number", { projects: 42 }]
  ])("yields no projects for %s", (_label, claims) => {
    expect(normalizeProjects(claims, log)).toEqual({});
  });
});

describe("deriveAuthorizationState", () => {
  it("keeps the scenario project granted on the platform", () => {
    const projects = { "p1.portal": { name: "P1", resources: [{ name: "plat.shared", username: "u.p1" }] } };

    expect(deriveAuthorizationState(projects, "plat.shared")).toEqual({
      "p1.portal": { name: "P1", username: "u.p1" }
    });
  });

  it("uses the first matching resource of a project", () => {
    const projects = {
      "project1.portal": {
        name: "Project 1",
        resources: [
          { name: "portal.other.shared", username: "other.project1" },
          { name: "portal.notebooks.shared", username: "first.project1" },
          { name: "portal.notebooks.shared", username: "second.project1" }
        ]
      }
    };

    expect(deriveAuthorizationState(projects, "portal.notebooks.shared")).toEqual({
      "project1.portal": { name: "Project 1", username: "first.project1" }
    });
  });

  it("drops projects without a resource on the platform", () => {
    const projects = {
      "project1.portal": {
        name: "Project 1",
        resources: [{ name: "portal.notebooks.shared", username: "nb.project1" }]
      },
      "project2.portal": {
        name: "Project 2",
        resources: [{ name: "portal.other.shared", username: "user.project2" }]
      }
    };

    expect(deriveAuthorizationState(projects, "portal.notebooks.shared")).toEqual({
      "project1.portal": { name: "Project 1", username: "nb.project1" }
    });
  });

  it("keeps every project that matches", () => {
    const projects = {
      "project1.portal": { name: "Project 1", resources: [{ name: "plat", username: "u.project1" }] },
      "project2.portal": { name: "Project 2", resources: [{ name: "plat", username: "u.project2" }] }
    };

    expect(deriveAuthorizationState(projects, "plat")).toEqual({
      "project1.portal": { name: "Project 1", username: "u.project1" },
      "project2.portal": { name: "Project 2", username: "u.project2" }
    });
  });

  it("is empty when nothing references the platform", () => {
    expect(deriveAuthorizationState({}, "plat")).toEqual({});
    expect(
      deriveAuthorizationState({ p: { name: "P", resources: [{ name: "elsewhere", username: "u" }] } }, "plat")
    ).toEqual({});
  });

  it("treats malformed entries as no match", () => {
    const projects = {
      "legacy-list": ["plat"],
      "no-name": { resources: [{ name: "plat", username: "u.x" }] },
      "bad-resources": { name: "Bad", resources: "plat" },
      "mixed.portal": { name: "Mixed", resources: [{ name: "plat" }, "plat", { name: "plat", username: "u.mixed" }] }
    };

    expect(deriveAuthorizationState(projects, "plat")).toEqual({
      "mixed.portal": { name: "Mixed", username: "u.mixed" }
    });
  });

  it("gives the same result for the same input", () => {
    const projects = { a: { name: "A", resources: [{ name: "plat", username: "u.a" }] } };

    expect(deriveAuthorizationState(projects, "plat")).toEqual(deriveAuthorizationState(projects, "plat"));
  });
});
