import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';

const EPS = 1e-6;

/** Axis aligned bounds, [min, max] */
export type Aabb = [Vec3, Vec3];

/** The index of the world axis that points "up" for a surface: 0 = x, 1 = y, 2 = z */
export type UpAxis = 0 | 1 | 2;

/**
 * The two in-plane axes of the plane orthogonal to an up axis.
 * Ordered so that (axes[0], axes[1], up) is right handed, so 2D signed areas are
 * positive for counter-clockwise turns when looking down from above.
 */
export type PlaneAxes = readonly [number, number];

const PLANE_AXES: Record<UpAxis, PlaneAxes> = {
    0: [1, 2],
    1: [2, 0],
    2: [0, 1],
};

export const getPlaneAxes = (upAxis: UpAxis): PlaneAxes => PLANE_AXES[upAxis];

export const createAabb = (): Aabb => [
    [Infinity, Infinity, Infinity],
    [-Infinity, -Infinity, -Infinity],
];

export const expandAabb = (bounds: Aabb, point: Vec3): void => {
    for (let i = 0; i < 3; i++) {
        if (point[i] < bounds[0][i]) bounds[0][i] = point[i];
        if (point[i] > bounds[1][i]) bounds[1][i] = point[i];
    }
};

export const overlapAabb = (a: Aabb, b: Aabb): boolean => {
    return (
        a[0][0] <= b[1][0] &&
        a[1][0] >= b[0][0] &&
        a[0][1] <= b[1][1] &&
        a[1][1] >= b[0][1] &&
        a[0][2] <= b[1][2] &&
        a[1][2] >= b[0][2]
    );
};

/**
 * Squared distance from a point to an axis aligned box, 0 if the point is inside.
 */
export const distancePtAabbSqr = (p: Vec3, bounds: Aabb): number => {
    let distSqr = 0;
    for (let i = 0; i < 3; i++) {
        const v = p[i];
        if (v < bounds[0][i]) {
            const d = bounds[0][i] - v;
            distSqr += d * d;
        } else if (v > bounds[1][i]) {
            const d = v - bounds[1][i];
            distSqr += d * d;
        }
    }
    return distSqr;
};

export const isFiniteVec3 = (v: Vec3): boolean => Number.isFinite(v[0]) && Number.isFinite(v[1]) && Number.isFinite(v[2]);

/**
 * 2D signed area in the plane of the given axes (positive if c is to the left of ab, seen from above)
 */
export const triArea2D = (a: Vec3, b: Vec3, c: Vec3, axes: PlaneAxes): number => {
    const [u, v] = axes;
    const abu = b[u] - a[u];
    const abv = b[v] - a[v];
    const acu = c[u] - a[u];
    const acv = c[v] - a[v];
    return abu * acv - abv * acu;
};

export type DistancePtSegSqr2dResult = { distSqr: number; t: number };

export const createDistancePtSegSqr2dResult = (): DistancePtSegSqr2dResult => ({
    distSqr: 0,
    t: 0,
});

export const distancePtSegSqr2d = (
    out: DistancePtSegSqr2dResult,
    pt: Vec3,
    p: Vec3,
    q: Vec3,
    axes: PlaneAxes,
): DistancePtSegSqr2dResult => {
    const [u, v] = axes;
    const pqu = q[u] - p[u];
    const pqv = q[v] - p[v];
    const du = pt[u] - p[u];
    const dv = pt[v] - p[v];

    const d = pqu * pqu + pqv * pqv;
    let t = pqu * du + pqv * dv;
    if (d > 0) t /= d;
    if (t < 0) t = 0;
    else if (t > 1) t = 1;

    const distU = p[u] + t * pqu - pt[u];
    const distV = p[v] + t * pqv - pt[v];

    out.distSqr = distU * distU + distV * distV;
    out.t = t;

    return out;
};

export type IntersectSegSeg2DResult = { hit: boolean; s: number; t: number };

export const createIntersectSegSeg2DResult = (): IntersectSegSeg2DResult => ({
    hit: false,
    s: 0,
    t: 0,
});

/**
 * Segment-segment intersection in the plane of the given axes.
 * Returns { hit, s, t } where
 *  P = a + s*(b-a) and Q = c + t*(d-c). Hit only if both s and t are within [0,1].
 */
export const intersectSegSeg2D = (
    out: IntersectSegSeg2DResult,
    a: Vec3,
    b: Vec3,
    c: Vec3,
    d: Vec3,
    axes: PlaneAxes,
): IntersectSegSeg2DResult => {
    const [u, v] = axes;
    const bau = b[u] - a[u];
    const bav = b[v] - a[v];
    const dcu = d[u] - c[u];
    const dcv = d[v] - c[v];
    const acu = a[u] - c[u];
    const acv = a[v] - c[v];
    const denom = dcv * bau - dcu * bav;
    if (Math.abs(denom) < 1e-12) {
        out.hit = false;
        out.s = 0;
        out.t = 0;
        return out;
    }
    const s = (dcu * acv - dcv * acu) / denom;
    const t = (bau * acv - bav * acu) / denom;
    out.hit = !(s < 0 || s > 1 || t < 0 || t > 1);
    out.s = s;
    out.t = t;
    return out;
};

/**
 * Tests if a point is inside a triangle in 2D, ignoring the up axis.
 * Points on an edge, within eps (relative to the triangle's doubled area), are inside.
 */
export const pointInTriangle2D = (p: Vec3, a: Vec3, b: Vec3, c: Vec3, axes: PlaneAxes, eps = EPS): boolean => {
    let area = triArea2D(a, b, c, axes);
    if (area === 0) return false;

    let w0 = triArea2D(b, c, p, axes);
    let w1 = triArea2D(c, a, p, axes);
    let w2 = triArea2D(a, b, p, axes);

    // normalise winding
    if (area < 0) {
        area = -area;
        w0 = -w0;
        w1 = -w1;
        w2 = -w2;
    }

    const tolerance = -eps * area;
    return w0 >= tolerance && w1 >= tolerance && w2 >= tolerance;
};

/**
 * Calculates the height of the triangle's plane directly above or below a point.
 * @returns the height along the up axis, or NaN if the point is not over the triangle
 */
export const closestHeightPointTriangle = (p: Vec3, a: Vec3, b: Vec3, c: Vec3, axes: PlaneAxes, upAxis: UpAxis): number => {
    const [u, v] = axes;

    const v0u = c[u] - a[u];
    const v0v = c[v] - a[v];
    const v0h = c[upAxis] - a[upAxis];

    const v1u = b[u] - a[u];
    const v1v = b[v] - a[v];
    const v1h = b[upAxis] - a[upAxis];

    const v2u = p[u] - a[u];
    const v2v = p[v] - a[v];

    // compute scaled barycentric coordinates
    let denom = v0u * v1v - v0v * v1u;
    if (Math.abs(denom) < EPS) {
        return NaN;
    }

    let s = v1v * v2u - v1u * v2v;
    let t = v0u * v2v - v0v * v2u;

    if (denom < 0) {
        denom = -denom;
        s = -s;
        t = -t;
    }

    const tolerance = EPS * denom;

    // if point lies inside the triangle, return interpolated height
    if (s >= -tolerance && t >= -tolerance && s + t <= denom + tolerance) {
        return a[upAxis] + (v0h * s + v1h * t) / denom;
    }

    return NaN;
};

const _triangleNormalAb = vec3.create();
const _triangleNormalAc = vec3.create();

/**
 * Computes the unit normal of a triangle.
 * @returns the length of the unnormalized normal, twice the triangle's area. 0 for a degenerate triangle, where out is left zeroed.
 */
export const getTriangleNormal = (out: Vec3, a: Vec3, b: Vec3, c: Vec3): number => {
    vec3.subtract(_triangleNormalAb, b, a);
    vec3.subtract(_triangleNormalAc, c, a);
    vec3.cross(out, _triangleNormalAb, _triangleNormalAc);

    const length = vec3.length(out);
    if (length > 0) {
        vec3.scale(out, out, 1 / length);
    } else {
        vec3.set(out, 0, 0, 0);
    }

    return length;
};

const _degenerateAb = vec3.create();
const _degenerateAc = vec3.create();
const _degenerateCross = vec3.create();

/**
 * Whether the triangle's vertices are collinear or coincident.
 * The test is scale independent: the sine of the angle at a must exceed eps.
 */
export const isDegenerateTriangle = (a: Vec3, b: Vec3, c: Vec3, eps: number): boolean => {
    vec3.subtract(_degenerateAb, b, a);
    vec3.subtract(_degenerateAc, c, a);
    vec3.cross(_degenerateCross, _degenerateAb, _degenerateAc);

    const crossLength = vec3.length(_degenerateCross);
    const edgeLengths = vec3.length(_degenerateAb) * vec3.length(_degenerateAc);

    return crossLength <= eps * edgeLengths;
};

const _closestPtSegAb = vec3.create();
const _closestPtSegAp = vec3.create();

/**
 * Calculates the closest point on a 3D segment to a given point
 * @returns the parameter t of the closest point along the segment, in [0, 1]
 */
export const closestPointOnSegment = (out: Vec3, p: Vec3, a: Vec3, b: Vec3): number => {
    vec3.subtract(_closestPtSegAb, b, a);
    vec3.subtract(_closestPtSegAp, p, a);

    const d = vec3.dot(_closestPtSegAb, _closestPtSegAb);
    let t = vec3.dot(_closestPtSegAb, _closestPtSegAp);
    if (d > 0) t /= d;
    if (t < 0) t = 0;
    else if (t > 1) t = 1;

    vec3.scaleAndAdd(out, a, _closestPtSegAb, t);

    return t;
};

const _closestPtTriAb = vec3.create();
const _closestPtTriAc = vec3.create();
const _closestPtTriAp = vec3.create();
const _closestPtTriBp = vec3.create();
const _closestPtTriCp = vec3.create();

/**
 * Calculates the closest point on a triangle to a given point in 3D.
 * Classifies the point against the triangle's vertex, edge and face regions using barycentric tests.
 */
export const closestPointOnTriangle = (out: Vec3, p: Vec3, a: Vec3, b: Vec3, c: Vec3): Vec3 => {
    const ab = vec3.subtract(_closestPtTriAb, b, a);
    const ac = vec3.subtract(_closestPtTriAc, c, a);
    const ap = vec3.subtract(_closestPtTriAp, p, a);

    // vertex region outside a
    const d1 = vec3.dot(ab, ap);
    const d2 = vec3.dot(ac, ap);
    if (d1 <= 0 && d2 <= 0) {
        return vec3.copy(out, a);
    }

    // vertex region outside b
    const bp = vec3.subtract(_closestPtTriBp, p, b);
    const d3 = vec3.dot(ab, bp);
    const d4 = vec3.dot(ac, bp);
    if (d3 >= 0 && d4 <= d3) {
        return vec3.copy(out, b);
    }

    // edge region of ab
    const vc = d1 * d4 - d3 * d2;
    if (vc <= 0 && d1 >= 0 && d3 <= 0) {
        const t = d1 / (d1 - d3);
        return vec3.scaleAndAdd(out, a, ab, t);
    }

    // vertex region outside c
    const cp = vec3.subtract(_closestPtTriCp, p, c);
    const d5 = vec3.dot(ab, cp);
    const d6 = vec3.dot(ac, cp);
    if (d6 >= 0 && d5 <= d6) {
        return vec3.copy(out, c);
    }

    // edge region of ac
    const vb = d5 * d2 - d1 * d6;
    if (vb <= 0 && d2 >= 0 && d6 <= 0) {
        const t = d2 / (d2 - d6);
        return vec3.scaleAndAdd(out, a, ac, t);
    }

    // edge region of bc
    const va = d3 * d6 - d5 * d4;
    if (va <= 0 && d4 - d3 >= 0 && d5 - d6 >= 0) {
        const t = (d4 - d3) / (d4 - d3 + (d5 - d6));
        out[0] = b[0] + (c[0] - b[0]) * t;
        out[1] = b[1] + (c[1] - b[1]) * t;
        out[2] = b[2] + (c[2] - b[2]) * t;
        return out;
    }

    // inside the face region
    const denom = 1 / (va + vb + vc);
    const v = vb * denom;
    const w = vc * denom;
    out[0] = a[0] + ab[0] * v + ac[0] * w;
    out[1] = a[1] + ab[1] * v + ac[1] * w;
    out[2] = a[2] + ab[2] * v + ac[2] * w;
    return out;
};

const _barycentricV0 = vec3.create();
const _barycentricV1 = vec3.create();
const _barycentricV2 = vec3.create();

/**
 * Barycentric coordinates (u, v, w) of the projection of p onto the triangle's plane, p' = u*a + v*b + w*c.
 * @returns false for a degenerate triangle
 */
export const getBarycentric = (out: Vec3, p: Vec3, a: Vec3, b: Vec3, c: Vec3): boolean => {
    const v0 = vec3.subtract(_barycentricV0, b, a);
    const v1 = vec3.subtract(_barycentricV1, c, a);
    const v2 = vec3.subtract(_barycentricV2, p, a);

    const d00 = vec3.dot(v0, v0);
    const d01 = vec3.dot(v0, v1);
    const d11 = vec3.dot(v1, v1);
    const d20 = vec3.dot(v2, v0);
    const d21 = vec3.dot(v2, v1);

    const denom = d00 * d11 - d01 * d01;
    if (denom === 0) {
        vec3.set(out, 0, 0, 0);
        return false;
    }

    const v = (d11 * d20 - d01 * d21) / denom;
    const w = (d00 * d21 - d01 * d20) / denom;

    vec3.set(out, 1 - v - w, v, w);
    return true;
};
