import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import {
    type Aabb,
    closestHeightPointTriangle,
    closestPointOnTriangle,
    createAabb,
    expandAabb,
    getBarycentric,
    getPlaneAxes,
    getTriangleNormal,
    isDegenerateTriangle,
    isFiniteVec3,
    pointInTriangle2D,
    triArea2D,
    type UpAxis,
} from '../geometry';
import { buildNavMeshBvTree, nearestBvTree, queryBvTree } from './bv-tree';
import {
    type CreateNavMeshResult,
    DEFAULT_DEGENERATE_EPSILON,
    InvalidTriangleReason,
    type NavMesh,
    NavMeshErrorType,
    type NavMeshParams,
    type NavMeshTriangle,
    type NavMeshTriangleIndices,
    type NavMeshVertex,
    type NonManifoldEdge,
    NULL_TRIANGLE,
} from './nav-mesh';
import { DEFAULT_QUERY_FILTER, type QueryFilter } from './query-filter';

/** Quality tier for snapping an arbitrary point onto the nav mesh */
export enum NavQuery {
    /** cheap: nearest plane among the triangles under or over the point */
    CLOSEST = 0,
    /** exact: the globally closest point on the mesh surface */
    ACCURACY = 1,
}

/** Default distance from a triangle's plane within which a point still counts as contained */
export const DEFAULT_CONTAINMENT_TOLERANCE = 1e-4;

const BARYCENTRIC_EPS = 1e-6;

const _createNavMeshA = vec3.create();
const _createNavMeshB = vec3.create();
const _createNavMeshC = vec3.create();
const _createNavMeshNormal = vec3.create();

/**
 * Builds a nav mesh from a vertex buffer and a triangle buffer.
 *
 * Vertices are validated first (finite coordinates), then triangles in order (indices in range,
 * distinct, not degenerate). Construction is atomic: on the first violation an error is returned and no mesh is produced.
 *
 * Adjacency is derived from an edge-keyed lookup. An edge owned by more than two triangles links only its first two owners,
 * and is reported in `navMesh.nonManifoldEdges`.
 */
export const createNavMesh = (
    vertices: NavMeshVertex[],
    triangles: NavMeshTriangleIndices[],
    params: NavMeshParams = {},
): CreateNavMeshResult => {
    const degenerateEpsilon = params.degenerateEpsilon ?? DEFAULT_DEGENERATE_EPSILON;

    /* validate and flatten vertices */
    const flatVertices: number[] = new Array(vertices.length * 3);
    for (let i = 0; i < vertices.length; i++) {
        const vertex = vertices[i];
        const x = vertex[0];
        const y = vertex[1];
        const z = vertex.length === 3 ? vertex[2] : 0;

        if (!Number.isFinite(x) || !Number.isFinite(y) || !Number.isFinite(z)) {
            return { success: false, error: { type: NavMeshErrorType.INVALID_VERTEX, vertexIndex: i } };
        }

        flatVertices[i * 3] = x;
        flatVertices[i * 3 + 1] = y;
        flatVertices[i * 3 + 2] = z;
    }

    const vertexCount = vertices.length;

    /* validate triangles and compute per triangle data */
    const navMeshTriangles: NavMeshTriangle[] = [];
    const normalWeights = [0, 0, 0];

    for (let t = 0; t < triangles.length; t++) {
        const [i0, i1, i2] = triangles[t];

        for (const index of [i0, i1, i2]) {
            if (!Number.isInteger(index) || index < 0 || index >= vertexCount) {
                return {
                    success: false,
                    error: {
                        type: NavMeshErrorType.INVALID_TRIANGLE,
                        triangleIndex: t,
                        reason: InvalidTriangleReason.INDEX_OUT_OF_RANGE,
                    },
                };
            }
        }

        if (i0 === i1 || i1 === i2 || i0 === i2) {
            return {
                success: false,
                error: {
                    type: NavMeshErrorType.INVALID_TRIANGLE,
                    triangleIndex: t,
                    reason: InvalidTriangleReason.DUPLICATE_INDEX,
                },
            };
        }

        const a = readVertex(_createNavMeshA, flatVertices, i0);
        const b = readVertex(_createNavMeshB, flatVertices, i1);
        const c = readVertex(_createNavMeshC, flatVertices, i2);

        if (isDegenerateTriangle(a, b, c, degenerateEpsilon)) {
            return {
                success: false,
                error: {
                    type: NavMeshErrorType.INVALID_TRIANGLE,
                    triangleIndex: t,
                    reason: InvalidTriangleReason.DEGENERATE,
                },
            };
        }

        const doubleArea = getTriangleNormal(_createNavMeshNormal, a, b, c);
        normalWeights[0] += Math.abs(_createNavMeshNormal[0]) * doubleArea;
        normalWeights[1] += Math.abs(_createNavMeshNormal[1]) * doubleArea;
        normalWeights[2] += Math.abs(_createNavMeshNormal[2]) * doubleArea;

        const bounds = createAabb();
        expandAabb(bounds, a);
        expandAabb(bounds, b);
        expandAabb(bounds, c);

        navMeshTriangles.push({
            vertices: [i0, i1, i2],
            neis: [NULL_TRIANGLE, NULL_TRIANGLE, NULL_TRIANGLE],
            normal: vec3.clone(_createNavMeshNormal),
            centroid: [(a[0] + b[0] + c[0]) / 3, (a[1] + b[1] + c[1]) / 3, (a[2] + b[2] + c[2]) / 3],
            bounds,
        });
    }

    /* edge keyed adjacency */
    const edgeOwners = new Map<number, { vertices: [number, number]; triangles: number[]; edges: number[] }>();

    for (let t = 0; t < navMeshTriangles.length; t++) {
        const triangle = navMeshTriangles[t];
        for (let e = 0; e < 3; e++) {
            const va = triangle.vertices[e];
            const vb = triangle.vertices[(e + 1) % 3];
            const min = Math.min(va, vb);
            const max = Math.max(va, vb);
            const key = min * vertexCount + max;

            let owners = edgeOwners.get(key);
            if (!owners) {
                owners = { vertices: [min, max], triangles: [], edges: [] };
                edgeOwners.set(key, owners);
            }
            owners.triangles.push(t);
            owners.edges.push(e);
        }
    }

    const nonManifoldEdges: NonManifoldEdge[] = [];

    for (const owners of edgeOwners.values()) {
        if (owners.triangles.length < 2) continue;

        const [ta, tb] = owners.triangles;
        const [ea, eb] = owners.edges;

        navMeshTriangles[ta].neis[ea] = tb;
        navMeshTriangles[tb].neis[eb] = ta;

        if (owners.triangles.length > 2) {
            nonManifoldEdges.push({ vertices: owners.vertices, triangles: owners.triangles.slice() });
        }
    }

    /* vertex membership */
    const vertexTriangles: number[][] = [];
    for (let v = 0; v < vertexCount; v++) {
        vertexTriangles.push([]);
    }
    for (let t = 0; t < navMeshTriangles.length; t++) {
        for (const v of navMeshTriangles[t].vertices) {
            vertexTriangles[v].push(t);
        }
    }

    /* up axis */
    let upAxis: UpAxis = 1;
    if (params.upAxis !== undefined) {
        upAxis = params.upAxis;
    } else {
        if (normalWeights[2] > normalWeights[upAxis]) upAxis = 2;
        if (normalWeights[0] > normalWeights[upAxis]) upAxis = 0;
    }

    /* mesh bounds */
    const bounds = createAabb();
    for (const triangle of navMeshTriangles) {
        expandAabb(bounds, triangle.bounds[0]);
        expandAabb(bounds, triangle.bounds[1]);
    }

    const navMesh: NavMesh = {
        vertices: flatVertices,
        triangles: navMeshTriangles,
        vertexTriangles,
        nonManifoldEdges,
        upAxis,
        planeAxes: getPlaneAxes(upAxis),
        bounds,
        bvTree: buildNavMeshBvTree(navMeshTriangles),
    };

    return { success: true, navMesh };
};

const readVertex = (out: Vec3, vertices: number[], index: number): Vec3 => {
    out[0] = vertices[index * 3];
    out[1] = vertices[index * 3 + 1];
    out[2] = vertices[index * 3 + 2];
    return out;
};

/** Reads a vertex position into out */
export const getVertex = (out: Vec3, navMesh: NavMesh, vertexIndex: number): Vec3 => {
    return readVertex(out, navMesh.vertices, vertexIndex);
};

/** Reads the three corner positions of a triangle */
export const getTriangleVertices = (outA: Vec3, outB: Vec3, outC: Vec3, navMesh: NavMesh, triangleIndex: number): void => {
    const [i0, i1, i2] = navMesh.triangles[triangleIndex].vertices;
    readVertex(outA, navMesh.vertices, i0);
    readVertex(outB, navMesh.vertices, i1);
    readVertex(outC, navMesh.vertices, i2);
};

export const isValidTriangleIndex = (navMesh: NavMesh, triangleIndex: number): boolean => {
    return Number.isInteger(triangleIndex) && triangleIndex >= 0 && triangleIndex < navMesh.triangles.length;
};

/** The triangles sharing an edge with the given triangle, in edge order */
export const getTriangleNeighbours = (navMesh: NavMesh, triangleIndex: number): number[] => {
    const neighbours: number[] = [];
    for (const nei of navMesh.triangles[triangleIndex].neis) {
        if (nei !== NULL_TRIANGLE) neighbours.push(nei);
    }
    return neighbours;
};

const _getPortalPointsApex = vec3.create();

/**
 * Retrieves the left and right points of the edge shared by two adjacent triangles,
 * as seen when walking from the 'from' triangle into the 'to' triangle.
 */
export const getPortalPoints = (
    navMesh: NavMesh,
    fromTriangle: number,
    toTriangle: number,
    outLeft: Vec3,
    outRight: Vec3,
): boolean => {
    const from = navMesh.triangles[fromTriangle];
    if (!from) return false;

    const edge = from.neis.indexOf(toTriangle);
    if (edge === -1) return false;

    const p = getVertex(outRight, navMesh, from.vertices[edge]);
    const q = getVertex(outLeft, navMesh, from.vertices[(edge + 1) % 3]);
    const apex = getVertex(_getPortalPointsApex, navMesh, from.vertices[(edge + 2) % 3]);

    // the opposite vertex is left of p -> q when the triangle winds counter-clockwise seen from above,
    // in which case q is on the left when facing the edge from inside the triangle
    if (triArea2D(p, q, apex, navMesh.planeAxes) <= 0) {
        vec3.copy(_getPortalPointsApex, p);
        vec3.copy(outRight, q);
        vec3.copy(outLeft, _getPortalPointsApex);
    }

    return true;
};

const _edgeMidPointPortalLeft = vec3.create();
const _edgeMidPointPortalRight = vec3.create();

export const getEdgeMidPoint = (navMesh: NavMesh, fromTriangle: number, toTriangle: number, outMidPoint: Vec3): boolean => {
    if (!getPortalPoints(navMesh, fromTriangle, toTriangle, _edgeMidPointPortalLeft, _edgeMidPointPortalRight)) {
        return false;
    }

    outMidPoint[0] = (_edgeMidPointPortalLeft[0] + _edgeMidPointPortalRight[0]) * 0.5;
    outMidPoint[1] = (_edgeMidPointPortalLeft[1] + _edgeMidPointPortalRight[1]) * 0.5;
    outMidPoint[2] = (_edgeMidPointPortalLeft[2] + _edgeMidPointPortalRight[2]) * 0.5;

    return true;
};

const _closestPointOnTriangleA = vec3.create();
const _closestPointOnTriangleB = vec3.create();
const _closestPointOnTriangleC = vec3.create();

/** Exact closest point on a triangle's surface to the given point */
export const getClosestPointOnTriangle = (out: Vec3, navMesh: NavMesh, triangleIndex: number, point: Vec3): Vec3 => {
    const a = _closestPointOnTriangleA;
    const b = _closestPointOnTriangleB;
    const c = _closestPointOnTriangleC;
    getTriangleVertices(a, b, c, navMesh, triangleIndex);

    return closestPointOnTriangle(out, point, a, b, c);
};

/**
 * Finds the triangles whose bounds overlap the query bounds, in ascending index order.
 */
export const queryTriangles = (navMesh: NavMesh, bounds: Aabb, filter: QueryFilter = DEFAULT_QUERY_FILTER): number[] => {
    const candidates = queryBvTree([], navMesh.bvTree, bounds);
    candidates.sort((a, b) => a - b);

    const result: number[] = [];
    for (const triangleIndex of candidates) {
        if (filter.passFilter(triangleIndex, navMesh)) {
            result.push(triangleIndex);
        }
    }
    return result;
};

const _columnBounds: Aabb = [
    [0, 0, 0],
    [0, 0, 0],
];

/** Triangles whose bounds contain the point's column along the up axis */
const queryColumn = (navMesh: NavMesh, point: Vec3, filter: QueryFilter): number[] => {
    vec3.copy(_columnBounds[0], point);
    vec3.copy(_columnBounds[1], point);
    _columnBounds[0][navMesh.upAxis] = -Infinity;
    _columnBounds[1][navMesh.upAxis] = Infinity;

    return queryTriangles(navMesh, _columnBounds, filter);
};

export type FindNearestTriangleResult = {
    success: boolean;
    /** the owning triangle, -1 on failure */
    triangleIndex: number;
    /** the snapped point */
    point: Vec3;
    /** distance from the query point to the snapped point */
    distance: number;
};

export const createFindNearestTriangleResult = (): FindNearestTriangleResult => ({
    success: false,
    triangleIndex: NULL_TRIANGLE,
    point: [0, 0, 0],
    distance: Infinity,
});

const _nearestA = vec3.create();
const _nearestB = vec3.create();
const _nearestC = vec3.create();
const _nearestCandidate = vec3.create();
const _nearestVertex = vec3.create();
const _nearestDiff = vec3.create();

const findNearestTriangleAccurate = (
    result: FindNearestTriangleResult,
    navMesh: NavMesh,
    point: Vec3,
    filter: QueryFilter,
): FindNearestTriangleResult => {
    let bestTriangle = NULL_TRIANGLE;
    let bestDistSqr = Infinity;

    nearestBvTree(navMesh.bvTree, point, (triangleIndex) => {
        if (!filter.passFilter(triangleIndex, navMesh)) return Infinity;

        getClosestPointOnTriangle(_nearestCandidate, navMesh, triangleIndex, point);
        const distSqr = vec3.squaredDistance(point, _nearestCandidate);

        if (distSqr < bestDistSqr || (distSqr === bestDistSqr && triangleIndex < bestTriangle)) {
            bestDistSqr = distSqr;
            bestTriangle = triangleIndex;
            vec3.copy(result.point, _nearestCandidate);
        }

        return distSqr;
    });

    if (bestTriangle === NULL_TRIANGLE) return result;

    result.success = true;
    result.triangleIndex = bestTriangle;
    result.distance = Math.sqrt(bestDistSqr);

    return result;
};

const findNearestTriangleClosest = (
    result: FindNearestTriangleResult,
    navMesh: NavMesh,
    point: Vec3,
    filter: QueryFilter,
): FindNearestTriangleResult => {
    const { upAxis, planeAxes } = navMesh;
    const a = _nearestA;
    const b = _nearestB;
    const c = _nearestC;

    /* nearest plane among the triangles directly under or over the point */
    let bestTriangle = NULL_TRIANGLE;
    let bestHeight = 0;
    let bestDist = Infinity;

    for (const triangleIndex of queryColumn(navMesh, point, filter)) {
        getTriangleVertices(a, b, c, navMesh, triangleIndex);

        const height = closestHeightPointTriangle(point, a, b, c, planeAxes, upAxis);
        if (Number.isNaN(height)) continue;

        const dist = Math.abs(point[upAxis] - height);
        if (dist < bestDist) {
            bestDist = dist;
            bestHeight = height;
            bestTriangle = triangleIndex;
        }
    }

    if (bestTriangle !== NULL_TRIANGLE) {
        vec3.copy(result.point, point);
        result.point[upAxis] = bestHeight;
        result.success = true;
        result.triangleIndex = bestTriangle;
        result.distance = bestDist;
        return result;
    }

    /* not over the mesh, fall back to the triangles touching the nearest vertex */
    let nearestVertex = -1;
    let nearestVertexDistSqr = Infinity;

    for (let v = 0; v < navMesh.vertexTriangles.length; v++) {
        const touching = navMesh.vertexTriangles[v];
        if (!touching.some((triangleIndex) => filter.passFilter(triangleIndex, navMesh))) continue;

        const distSqr = vec3.squaredDistance(point, getVertex(_nearestVertex, navMesh, v));
        if (distSqr < nearestVertexDistSqr) {
            nearestVertexDistSqr = distSqr;
            nearestVertex = v;
        }
    }

    if (nearestVertex === -1) return result;

    let bestPlaneDist = Infinity;
    let bestSignedDist = 0;

    for (const triangleIndex of navMesh.vertexTriangles[nearestVertex]) {
        if (!filter.passFilter(triangleIndex, navMesh)) continue;

        const triangle = navMesh.triangles[triangleIndex];
        getVertex(a, navMesh, triangle.vertices[0]);

        const signedDist = vec3.dot(vec3.subtract(_nearestDiff, point, a), triangle.normal);
        if (Math.abs(signedDist) < bestPlaneDist) {
            bestPlaneDist = Math.abs(signedDist);
            bestSignedDist = signedDist;
            bestTriangle = triangleIndex;
        }
    }

    vec3.scaleAndAdd(result.point, point, navMesh.triangles[bestTriangle].normal, -bestSignedDist);
    result.success = true;
    result.triangleIndex = bestTriangle;
    result.distance = bestPlaneDist;

    return result;
};

/**
 * Snaps a point onto the nav mesh.
 *
 * - NavQuery.ACCURACY returns the globally closest point on the mesh surface and its triangle,
 *   ties going to the lowest triangle index.
 * - NavQuery.CLOSEST projects the point, along the up axis, onto the nearest plane among the triangles under or over it.
 *   If no triangle is under or over the point, the point is projected onto the nearest plane among the triangles
 *   touching the nearest vertex, which may lie outside the mesh.
 *
 * Fails if no triangle passes the filter.
 */
export const findNearestTriangle = (
    result: FindNearestTriangleResult,
    navMesh: NavMesh,
    point: Vec3,
    query: NavQuery,
    filter: QueryFilter = DEFAULT_QUERY_FILTER,
): FindNearestTriangleResult => {
    result.success = false;
    result.triangleIndex = NULL_TRIANGLE;
    result.distance = Infinity;
    vec3.copy(result.point, point);

    if (!isFiniteVec3(point)) return result;

    if (query === NavQuery.ACCURACY) {
        return findNearestTriangleAccurate(result, navMesh, point, filter);
    }

    return findNearestTriangleClosest(result, navMesh, point, filter);
};

export type FindContainingTriangleResult = {
    success: boolean;
    /** the containing triangle, -1 on failure */
    triangleIndex: number;
};

export const createFindContainingTriangleResult = (): FindContainingTriangleResult => ({
    success: false,
    triangleIndex: NULL_TRIANGLE,
});

const _containingBounds: Aabb = [
    [0, 0, 0],
    [0, 0, 0],
];
const _containingBarycentric = vec3.create();
const _containingDiff = vec3.create();

/**
 * Finds the triangle containing a point that lies on or near the mesh surface.
 *
 * - NavQuery.CLOSEST returns the lowest index triangle whose footprint (ignoring the up axis) contains the point.
 * - NavQuery.ACCURACY requires the point to be within `tolerance` of the triangle's plane and inside its edges,
 *   the nearest plane wins, then the lowest index.
 */
export const findContainingTriangle = (
    result: FindContainingTriangleResult,
    navMesh: NavMesh,
    point: Vec3,
    query: NavQuery,
    tolerance = DEFAULT_CONTAINMENT_TOLERANCE,
    filter: QueryFilter = DEFAULT_QUERY_FILTER,
): FindContainingTriangleResult => {
    result.success = false;
    result.triangleIndex = NULL_TRIANGLE;

    if (!isFiniteVec3(point)) return result;

    const a = _nearestA;
    const b = _nearestB;
    const c = _nearestC;

    if (query === NavQuery.CLOSEST) {
        for (const triangleIndex of queryColumn(navMesh, point, filter)) {
            getTriangleVertices(a, b, c, navMesh, triangleIndex);

            if (pointInTriangle2D(point, a, b, c, navMesh.planeAxes)) {
                result.success = true;
                result.triangleIndex = triangleIndex;
                return result;
            }
        }

        return result;
    }

    for (let i = 0; i < 3; i++) {
        _containingBounds[0][i] = point[i] - tolerance;
        _containingBounds[1][i] = point[i] + tolerance;
    }

    let bestDist = Infinity;

    for (const triangleIndex of queryTriangles(navMesh, _containingBounds, filter)) {
        getTriangleVertices(a, b, c, navMesh, triangleIndex);

        const planeDist = Math.abs(vec3.dot(vec3.subtract(_containingDiff, point, a), navMesh.triangles[triangleIndex].normal));
        if (planeDist > tolerance) continue;

        if (!getBarycentric(_containingBarycentric, point, a, b, c)) continue;

        const [u, v, w] = _containingBarycentric;
        if (u < -BARYCENTRIC_EPS || v < -BARYCENTRIC_EPS || w < -BARYCENTRIC_EPS) continue;

        if (planeDist < bestDist) {
            bestDist = planeDist;
            result.success = true;
            result.triangleIndex = triangleIndex;
        }
    }

    return result;
};
