import type { Vec3 } from 'mathcat';
import { describe, expect, test } from 'vitest';
import {
    closestHeightPointTriangle,
    closestPointOnTriangle,
    createDistancePtSegSqr2dResult,
    createIntersectSegSeg2DResult,
    distancePtSegSqr2d,
    getBarycentric,
    getPlaneAxes,
    intersectSegSeg2D,
    isDegenerateTriangle,
    pointInTriangle2D,
    triArea2D,
} from '../src/geometry';

const expectVec3CloseTo = (actual: Vec3, expected: Vec3) => {
    expect(actual[0]).toBeCloseTo(expected[0]);
    expect(actual[1]).toBeCloseTo(expected[1]);
    expect(actual[2]).toBeCloseTo(expected[2]);
};

describe('geometry.getPlaneAxes', () => {
    test('plane axes form a right handed frame with the up axis', () => {
        expect(getPlaneAxes(0)).toEqual([1, 2]);
        expect(getPlaneAxes(1)).toEqual([2, 0]);
        expect(getPlaneAxes(2)).toEqual([0, 1]);
    });
});

describe('geometry.triArea2D', () => {
    test('is positive when c is left of ab seen from above', () => {
        expect(triArea2D([0, 0, 0], [1, 0, 0], [0, 1, 0], getPlaneAxes(2))).toBe(1);
        expect(triArea2D([0, 0, 0], [1, 0, 0], [0, -1, 0], getPlaneAxes(2))).toBe(-1);
    });

    test('ignores the up axis', () => {
        expect(triArea2D([0, 5, 0], [0, -3, 1], [1, 7, 0], getPlaneAxes(1))).toBe(1);
    });
});

describe('geometry.pointInTriangle2D', () => {
    const a: Vec3 = [0, 0, 0];
    const b: Vec3 = [10, 0, 0];
    const c: Vec3 = [0, 10, 0];

    test('point on edge is considered inside', () => {
        expect(pointInTriangle2D([5, 0, 0], a, b, c, getPlaneAxes(2))).toBe(true);
    });

    test('point outside triangle is false', () => {
        expect(pointInTriangle2D([6, 6, 0], a, b, c, getPlaneAxes(2))).toBe(false);
    });

    test('works for either winding', () => {
        expect(pointInTriangle2D([2, 2, 0], a, c, b, getPlaneAxes(2))).toBe(true);
    });
});

describe('geometry.closestHeightPointTriangle', () => {
    // sloped triangle, y = 0.2 * x
    const a: Vec3 = [0, 0, 0];
    const b: Vec3 = [10, 2, 0];
    const c: Vec3 = [0, 0, 10];

    test('returns the height of the plane under the point', () => {
        expect(closestHeightPointTriangle([2, 50, 2], a, b, c, getPlaneAxes(1), 1)).toBeCloseTo(0.4);
    });

    test('returns NaN when the point is not over the triangle', () => {
        expect(closestHeightPointTriangle([20, 0, 20], a, b, c, getPlaneAxes(1), 1)).toBeNaN();
    });
});

describe('geometry.closestPointOnTriangle', () => {
    const a: Vec3 = [0, 0, 0];
    const b: Vec3 = [10, 0, 0];
    const c: Vec3 = [0, 10, 0];

    test('projects onto the face', () => {
        expectVec3CloseTo(closestPointOnTriangle([0, 0, 0], [2, 2, 5], a, b, c), [2, 2, 0]);
    });

    test('clamps to a vertex', () => {
        expect(closestPointOnTriangle([0, 0, 0], [-5, -5, 0], a, b, c)).toEqual([0, 0, 0]);
    });

    test('clamps to an edge', () => {
        expectVec3CloseTo(closestPointOnTriangle([0, 0, 0], [5, -3, 0], a, b, c), [5, 0, 0]);
        expectVec3CloseTo(closestPointOnTriangle([0, 0, 0], [10, 10, 0], a, b, c), [5, 5, 0]);
    });
});

describe('geometry.getBarycentric', () => {
    test('computes barycentric coordinates', () => {
        const out: Vec3 = [0, 0, 0];
        expect(getBarycentric(out, [2, 2, 0], [0, 0, 0], [10, 0, 0], [0, 10, 0])).toBe(true);
        expectVec3CloseTo(out, [0.6, 0.2, 0.2]);
    });

    test('fails for a degenerate triangle', () => {
        const out: Vec3 = [0, 0, 0];
        expect(getBarycentric(out, [1, 0, 0], [0, 0, 0], [1, 0, 0], [2, 0, 0])).toBe(false);
    });
});

describe('geometry.isDegenerateTriangle', () => {
    test('collinear vertices are degenerate', () => {
        expect(isDegenerateTriangle([0, 0, 0], [1, 0, 0], [2, 0, 0], 1e-9)).toBe(true);
    });

    test('coincident vertices are degenerate', () => {
        expect(isDegenerateTriangle([1, 1, 1], [1, 1, 1], [2, 0, 0], 1e-9)).toBe(true);
    });

    test('a right triangle is not degenerate', () => {
        expect(isDegenerateTriangle([0, 0, 0], [1, 0, 0], [0, 1, 0], 1e-9)).toBe(false);
    });
});

describe('geometry.intersectSegSeg2D', () => {
    test('crossing segments hit at their parameters', () => {
        const result = intersectSegSeg2D(
            createIntersectSegSeg2DResult(),
            [0, 0, 0],
            [10, 0, 0],
            [5, -5, 0],
            [5, 5, 0],
            getPlaneAxes(2),
        );
        expect(result.hit).toBe(true);
        expect(result.s).toBeCloseTo(0.5);
        expect(result.t).toBeCloseTo(0.5);
    });

    test('parallel segments do not hit', () => {
        const result = intersectSegSeg2D(
            createIntersectSegSeg2DResult(),
            [0, 0, 0],
            [10, 0, 0],
            [0, 1, 0],
            [10, 1, 0],
            getPlaneAxes(2),
        );
        expect(result.hit).toBe(false);
    });
});

describe('geometry.distancePtSegSqr2d', () => {
    test('ignores the up axis', () => {
        const result = distancePtSegSqr2d(createDistancePtSegSqr2dResult(), [5, 3, 99], [0, 0, 0], [10, 0, 0], getPlaneAxes(2));
        expect(result.distSqr).toBeCloseTo(9);
        expect(result.t).toBeCloseTo(0.5);
    });
});
