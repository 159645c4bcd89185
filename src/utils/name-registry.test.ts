import { describe, it, expect } from "vitest";
import { NameRegistry, nameFor, stemFor } from "./name-registry";

describe("stemFor", () => {
  it("drops the 6-character prefix and keeps 8 characters in short style", () => {
    expect(stemFor("AF1QipOlxzhFkvAbCdEf", "short")).toBe("OlxzhFkv");
  });

  it("keeps the whole id in full style", () => {
    expect(stemFor("AF1QipOlxzhFkvAbCdEf", "full")).toBe("AF1QipOlxzhFkvAbCdEf");
  });

  it("keeps ids no longer than the prefix as they are", () => {
    expect(stemFor("abc", "short")).toBe("abc");
  });

  it("replaces characters that are unsafe in filenames", () => {
    expect(stemFor("AF1Qip.b/c:d", "full")).toBe("AF1Qip_b_c_d");
  });
});

describe("nameFor", () => {
  it("uses jpg for photos and mp4 for videos", () => {
    expect(nameFor({ id: "AF1QipOlxzhFkvAbCdEf", kind: "photo" })).toBe(
      "OlxzhFkv.jpg",
    );
    expect(nameFor({ id: "AF1QipOlxzhFkvAbCdEf", kind: "video" })).toBe(
      "OlxzhFkv.mp4",
    );
  });

  it("is deterministic", () => {
    const entry = { id: "AF1QipRepeatable123", kind: "photo" as const };
    expect(nameFor(entry)).toBe(nameFor(entry));
  });
});

describe("NameRegistry", () => {
  it("falls back to the full id when a short name is taken", () => {
    const registry = new NameRegistry("short");
    expect(registry.assign({ id: "AF1QipSameStemXXXX1", kind: "photo" })).toBe(
      "SameStem.jpg",
    );
    expect(registry.assign({ id: "AF1QipSameStemYYYY2", kind: "photo" })).toBe(
      "AF1QipSameStemYYYY2.jpg",
    );
  });

  it("does not treat different kinds with one stem as a collision", () => {
    const registry = new NameRegistry("short");
    expect(registry.assign({ id: "AF1QipSameStemXXXX1", kind: "photo" })).toBe(
      "SameStem.jpg",
    );
    expect(registry.assign({ id: "AF1QipSameStemYYYY2", kind: "video" })).toBe(
      "SameStem.mp4",
    );
  });

  it("compares names case-insensitively", () => {
    const registry = new NameRegistry("short");
    registry.assign({ id: "AF1QipAbCdEfGh", kind: "photo" });
    expect(registry.assign({ id: "AF1QipabcdefghZ", kind: "photo" })).toBe(
      "AF1QipabcdefghZ.jpg",
    );
  });

  it("adds a numeric suffix when the full name is taken too", () => {
    const registry = new NameRegistry("short");
    registry.register("SameStem.jpg");
    registry.register("AF1QipSameStemXXXX1.jpg");
    expect(registry.assign({ id: "AF1QipSameStemXXXX1", kind: "photo" })).toBe(
      "AF1QipSameStemXXXX1-1.jpg",
    );
  });

  it("assigns the same names for the same sequence", () => {
    const ids = ["AF1QipSameStemA", "AF1QipSameStemB", "AF1QipOtherOne1"];
    const run = () => {
      const registry = new NameRegistry("short");
      return ids.map((id) => registry.assign({ id, kind: "photo" }));
    };
    expect(run()).toEqual(run());
    expect(new Set(run()).size).toBe(3);
  });

  describe("assignAll", () => {
    it("gives every entry of a shared short stem its full id", () => {
      const registry = new NameRegistry("short");
      expect(
        registry.assignAll([
          { id: "AF1QipSameStemXXXX1", kind: "photo" },
          { id: "AF1QipUniqueOne1234", kind: "photo" },
          { id: "AF1QipSameStemYYYY2", kind: "photo" },
        ]),
      ).toEqual([
        "AF1QipSameStemXXXX1.jpg",
        "UniqueOn.jpg",
        "AF1QipSameStemYYYY2.jpg",
      ]);
    });

    it("does not depend on the order of the batch", () => {
      const first = { id: "AF1QipSameStemXXXX1", kind: "photo" as const };
      const second = { id: "AF1QipSameStemYYYY2", kind: "photo" as const };

      const forward = new NameRegistry("short").assignAll([first, second]);
      const backward = new NameRegistry("short").assignAll([second, first]);

      expect(forward).toEqual([backward[1], backward[0]]);
    });

    it("keeps short names when no stem is shared", () => {
      expect(
        new NameRegistry("short").assignAll([
          { id: "AF1QipSameStemXXXX1", kind: "photo" },
          { id: "AF1QipSameStemYYYY2", kind: "video" },
        ]),
      ).toEqual(["SameStem.jpg", "SameStem.mp4"]);
    });
  });
});
