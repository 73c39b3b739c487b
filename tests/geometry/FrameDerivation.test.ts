import { DEFAULT_ENGINE_OPTIONS } from "@/config/engineConfig";
import { DomainError } from "@/geometry/errors";
import {
  bottomBracketPoint,
  frontHubPoint,
  headTubeAxisOffset,
  headTubeSegment,
  hubHeight,
  rearHubPoint,
  saddleSegment,
  seatTubeSegment,
  stemSegment,
  straightTubes,
} from "@/geometry/FrameDerivation";
import { Segment } from "@/math/Segment";
import { Vec2 } from "@/math/Vec2";
import { createBike, createRider } from "@test/helpers/bikeHelpers";
import { describe, expect, it } from "vitest";

const TOLERANCE = DEFAULT_ENGINE_OPTIONS.tolerance;

describe("FrameDerivation", () => {
  describe("bottomBracketPoint", () => {
    it("should sit bb drop below the hub line", () => {
      const spec = createBike();
      expect(hubHeight(spec)).toBe(350);
      expect(bottomBracketPoint(spec)).toEqual({ x: 0, y: 275 });
    });
  });

  describe("rearHubPoint", () => {
    it("should place the rear hub on the hub line behind the bottom bracket", () => {
      const hub = rearHubPoint(createBike());
      expect(hub.x).toBeCloseTo(-Math.sqrt(450 * 450 - 75 * 75), 9);
      expect(hub.y).toBe(350);
    });

    it("should keep the chainstay length between hub and bottom bracket", () => {
      for (const [chainstayLength, bbDrop] of [
        [450, 75],
        [405, 60],
        [430.5, 0],
        [520, 80],
      ] as const) {
        const spec = createBike({ chainstayLength, bbDrop });
        const distance = Vec2.distance(rearHubPoint(spec), bottomBracketPoint(spec));
        expect(distance).toBeCloseTo(chainstayLength, 9);
      }
    });

    it("should put the hub directly above the bottom bracket when chainstay equals drop", () => {
      const hub = rearHubPoint(createBike({ chainstayLength: 75, bbDrop: 75 }));
      expect(hub.x).toBe(0);
    });

    it("should throw when the chainstay is shorter than the drop", () => {
      const spec = createBike({ chainstayLength: 70, bbDrop: 75 });
      expect(() => rearHubPoint(spec)).toThrow(DomainError);
      expect(() => rearHubPoint(spec)).toThrow("chainstay too short for bottom-bracket drop");
    });

    it("should throw for a negative chainstay even though its square exceeds the drop's", () => {
      const spec = createBike({ chainstayLength: -500, bbDrop: 75 });
      expect(() => rearHubPoint(spec)).toThrow(DomainError);
    });

    it("should throw when a negative drop outweighs the chainstay", () => {
      const spec = createBike({ chainstayLength: 50, bbDrop: -75 });
      expect(() => rearHubPoint(spec)).toThrow("chainstay too short for bottom-bracket drop");
    });
  });

  describe("frontHubPoint", () => {
    it("should be exactly one wheelbase ahead of the rear hub", () => {
      const spec = createBike();
      const rear = rearHubPoint(spec);
      const front = frontHubPoint(spec, rear);
      expect(Math.abs(front.x - rear.x - spec.wheelbase)).toBeLessThan(1e-9);
      expect(front.y).toBe(rear.y);
    });
  });

  describe("headTubeAxisOffset", () => {
    it("should equal the fork offset for a vertical steering axis", () => {
      expect(headTubeAxisOffset(createBike({ headTubeAngle: 90 }), TOLERANCE)).toBe(50);
    });

    it("should grow as the head angle slackens", () => {
      const steep = headTubeAxisOffset(createBike({ headTubeAngle: 74 }), TOLERANCE);
      const slack = headTubeAxisOffset(createBike({ headTubeAngle: 65 }), TOLERANCE);
      expect(slack).toBeGreaterThan(steep);
      expect(slack).toBeCloseTo(50 / Math.sin(Vec2.toRadians(65)), 9);
    });

    it("should throw for a horizontal steering axis", () => {
      expect(() => headTubeAxisOffset(createBike({ headTubeAngle: 0 }), TOLERANCE)).toThrow(
        DomainError
      );
    });
  });

  describe("headTubeSegment", () => {
    it("should stack fork length and head tube length along the steering axis", () => {
      const spec = createBike();
      const front = frontHubPoint(spec, rearHubPoint(spec));
      const headTube = headTubeSegment(spec, front, TOLERANCE);

      expect(headTube.start.x).toBeCloseTo(447.661015, 5);
      expect(headTube.start.y).toBeCloseTo(734.071080, 5);
      expect(headTube.end.x).toBeCloseTo(382.613560, 5);
      expect(headTube.end.y).toBeCloseTo(928.477430, 5);
      expect(Segment.length(headTube)).toBeCloseTo(205, 9);
    });

    it("should keep the fork offset as the perpendicular distance from the front hub", () => {
      const spec = createBike();
      const front = frontHubPoint(spec, rearHubPoint(spec));
      const { start, end } = headTubeSegment(spec, front, TOLERANCE);
      // |cross(axis, hub - start)| / |axis|
      const ax = end.x - start.x;
      const ay = end.y - start.y;
      const cross = ax * (front.y - start.y) - ay * (front.x - start.x);
      expect(Math.abs(cross) / Math.hypot(ax, ay)).toBeCloseTo(spec.forkOffset, 9);
    });
  });

  describe("seatTubeSegment", () => {
    it("should start at the bottom bracket", () => {
      const spec = createBike();
      const bb = bottomBracketPoint(spec);
      const seatTube = seatTubeSegment(spec, bb);
      expect(seatTube.start).toEqual(bb);
      expect(seatTube.end.x).toBeCloseTo(-168.395248, 5);
      expect(seatTube.end.y).toBeCloseTo(809.081492, 5);
    });
  });

  describe("straightTubes", () => {
    it("should join the derived points", () => {
      const bb = { x: 0, y: 0 };
      const rear = { x: -1, y: 1 };
      const front = { x: 5, y: 1 };
      const headTube = Segment.create({ x: 4, y: 3 }, { x: 3.5, y: 4 });
      const seatTube = Segment.create(bb, { x: -0.5, y: 4 });

      const tubes = straightTubes(bb, rear, front, headTube, seatTube);

      expect(tubes.chainstay).toEqual({ start: bb, end: rear });
      expect(tubes.seatStay).toEqual({ start: { x: -0.5, y: 4 }, end: rear });
      expect(tubes.fork).toEqual({ start: front, end: { x: 4, y: 3 } });
      expect(tubes.topTube).toEqual({ start: { x: 3.5, y: 4 }, end: { x: -0.5, y: 4 } });
      expect(tubes.downTube).toEqual({ start: { x: 4, y: 3 }, end: bb });
    });
  });

  describe("stemSegment", () => {
    const headTube = Segment.create({ x: 447.66, y: 734.07 }, { x: 382.61, y: 928.48 });

    it("should be null without stem parameters", () => {
      expect(stemSegment(createBike(), headTube, DEFAULT_ENGINE_OPTIONS)).toBeNull();
      expect(
        stemSegment(createBike({ stemLength: 100 }), headTube, DEFAULT_ENGINE_OPTIONS)
      ).toBeNull();
    });

    it("should start above the head tube on the steering axis", () => {
      const spec = createBike({ stemAngle: -6, stemLength: 100 });
      const stem = stemSegment(spec, headTube, DEFAULT_ENGINE_OPTIONS);
      expect(stem).not.toBeNull();
      if (!stem) return;

      expect(Vec2.distance(headTube.end, stem.start)).toBeCloseTo(40, 9);
      expect(Segment.length(stem)).toBeCloseTo(115.9, 9);
    });

    it("should be perpendicular to the steerer for a zero-degree stem", () => {
      const spec = createBike({ stemAngle: 0, stemLength: 100 });
      const stem = stemSegment(spec, headTube, DEFAULT_ENGINE_OPTIONS);
      if (!stem) throw new Error("expected a stem");

      const axis = Vec2.vectorEndpoint({ x: 0, y: 0 }, 1, spec.headTubeAngle);
      const reach = Vec2.subtract(stem.end, stem.start);
      expect(axis.x * reach.x + axis.y * reach.y).toBeCloseTo(0, 9);
      expect(reach.x).toBeGreaterThan(0);
    });
  });

  describe("saddleSegment", () => {
    it("should be null without a rider", () => {
      expect(saddleSegment(createBike(), null, { x: 0, y: 275 })).toBeNull();
    });

    it("should centre the rails on the saddle height point shifted by set back", () => {
      const spec = createBike();
      const saddle = saddleSegment(spec, createRider(), { x: 0, y: 275 });
      if (!saddle) throw new Error("expected a saddle");

      expect(saddle.start.x).toBeCloseTo(-121.508176, 5);
      expect(saddle.end.x).toBeCloseTo(-391.508176, 5);
      expect(saddle.start.y).toBeCloseTo(961.676205, 5);
      expect(saddle.end.y).toBe(saddle.start.y);
      expect(Segment.length(saddle)).toBeCloseTo(270, 9);
    });
  });
});
