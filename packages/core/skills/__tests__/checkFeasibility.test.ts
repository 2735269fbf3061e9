/**
 * CHECK FEASIBILITY SKILL — TESTS
 */

import { describe, it, expect } from "vitest";
import { runSkill } from "../types";
import { checkFeasibility, checkFeasibilitySkill, resolveKnownPlace } from "../checkFeasibility.skill";
import { createMockContext } from "./helpers";

describe("CheckFeasibilitySkill", () => {
  describe("Infeasible requests", () => {
    it("rejects a beach day in an inland city and suggests a coastal alternative", () => {
      const result = checkFeasibility("Beach day with friends", "Anand, Gujarat, India");

      expect(result).toEqual({
        feasible: false,
        reason: "Beach time needs a beach or open water, and Anand has none.",
        suggestion: "Try Diu instead.",
        verified: true,
        matchedRequirements: ["beach"],
        resolvedPlace: "Anand",
      });
    });

    it("rejects skiing in a coastal city without snow", () => {
      const result = checkFeasibility("Skiing trip", "Mumbai");

      expect(result.feasible).toBe(false);
      expect(result.reason).toBe("Skiing needs ski slopes, and Mumbai has none.");
      expect(result.suggestion).toBe("Try Gulmarg instead.");
    });

    it("falls back to a generic suggestion when no alternative is known", () => {
      const result = checkFeasibility("Surfing lessons", "Kathmandu");

      expect(result.feasible).toBe(false);
      expect(result.suggestion).toBe("Pick a location with a sea coast.");
    });
  });

  describe("Feasible requests", () => {
    it("accepts ocean activities on a coast", () => {
      const result = checkFeasibility("Surfing lessons", "Miami");

      expect(result.feasible).toBe(true);
      expect(result.verified).toBe(true);
      expect(result.reason).toBe("Miami has a sea coast");
    });

    it("counts a lake shore as a beach", () => {
      expect(checkFeasibility("Beach day", "Chicago, IL").feasible).toBe(true);
    });

    it("resolves aliases", () => {
      const result = checkFeasibility("Sunbathing", "bombay");

      expect(result.resolvedPlace).toBe("Mumbai");
      expect(result.feasible).toBe(true);
      expect(result.reason).toBe("Mumbai has a beach or open water");
    });

    it("passes tasks with no geographic requirement", () => {
      const result = checkFeasibility("Museum visit", "London");

      expect(result.feasible).toBe(true);
      expect(result.matchedRequirements).toEqual([]);
      expect(result.reason).toBe("Nothing in the request depends on London's geography");
    });

    it("does not mistake the sky for skiing", () => {
      const result = checkFeasibility("Picnic under clear skies", "Mumbai");

      expect(result).toEqual({
        feasible: true,
        reason: "Nothing in the request depends on Mumbai's geography",
        suggestion: null,
        verified: true,
        matchedRequirements: [],
        resolvedPlace: "Mumbai",
      });
    });

    it("lets unknown places through unverified", () => {
      const result = checkFeasibility("Beach day", "Atlantis");

      expect(result).toEqual({
        feasible: true,
        reason: "No known geographic limits for Atlantis; proceeding with planning",
        suggestion: null,
        verified: false,
        matchedRequirements: ["beach"],
        resolvedPlace: null,
      });
    });
  });

  describe("Place resolution", () => {
    it("matches the full text before the first segment", () => {
      expect(resolveKnownPlace("  New   York City ")?.name).toBe("New York");
      expect(resolveKnownPlace("Salt Lake City, Utah")?.name).toBe("Salt Lake City");
      expect(resolveKnownPlace("Springfield")).toBeNull();
    });
  });

  describe("Skill runner", () => {
    it("summarises the verdict in the notes", async () => {
      const ctx = createMockContext();
      const result = await runSkill(checkFeasibilitySkill, ctx, {
        task: "Beach day",
        location: "Anand",
      });

      expect(result.output.feasible).toBe(false);
      expect(result.meta.ok).toBe(true);
      expect(result.meta.notes).toEqual(["place=Anand requirements=[beach] feasible=false"]);
    });
  });
});
