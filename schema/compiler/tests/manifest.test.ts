/**
 * Generation Manifest Tests
 */

import { describe, it, expect } from "vitest";
import { buildManifest, GENERATOR, sha256 } from "../src/generators/manifest.js";

describe("buildManifest", () => {
  it("should hash content with sha256", () => {
    expect(sha256("abc")).toBe(
      "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad"
    );
  });

  it("should record artifacts in a fixed order", () => {
    const manifest = buildManifest({
      source: "",
      name: "blog",
      version: "1.0",
      entities: [
        {
          entity: "User",
          table: "public.users",
          artifacts: { repository: "abc", up: "" },
        },
      ],
    });

    expect(manifest).toEqual({
      generator: { name: GENERATOR.name, version: GENERATOR.version },
      schema: {
        name: "blog",
        version: "1.0",
        sha256: "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
      },
      entities: [
        {
          entity: "User",
          table: "public.users",
          artifacts: [
            {
              kind: "up",
              sha256: "e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
            },
            {
              kind: "repository",
              sha256: "ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
            },
          ],
        },
      ],
    });
  });

  it("should leave out schema name and version when absent", () => {
    const manifest = buildManifest({ source: "abc", entities: [] });
    expect(Object.keys(manifest.schema)).toEqual(["sha256"]);
  });

  it("should be identical for identical input", () => {
    const input = {
      source: "entities: {}",
      entities: [{ entity: "A", table: "public.a", artifacts: { up: "x", down: "y" } }],
    };
    expect(JSON.stringify(buildManifest(input))).toBe(JSON.stringify(buildManifest(input)));
  });
});
