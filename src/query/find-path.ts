import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import { isFiniteVec3 } from '../geometry';
import { findPortalMidpointPath } from './find-portal-midpoint-path';
import {
    FindStraightPathResultFlags,
    findStraightPath,
    type StraightPathPoint,
    StraightPathPointFlags,
} from './find-straight-path';
import { type NavMesh, NULL_TRIANGLE } from './nav-mesh';
import { createFindNearestTriangleResult, findNearestTriangle, NavQuery } from './nav-mesh-api';
import { FindNodePathResultFlags, type FindNodePathResult, findNodePath } from './nav-mesh-search';
import { DEFAULT_QUERY_FILTER, type QueryFilter } from './query-filter';

/** Quality tier for turning a triangle corridor into points */
export enum NavPathMode {
    /** the midpoints of the crossed edges */
    FAST = 0,
    /** the shortest path through the corridor */
    ACCURACY = 1,
}

/** start and end closer than this are the same point */
const SAME_POINT_EPSILON = 1e-6;

export enum FindPathResultFlags {
    NONE = 0,
    SUCCESS = 1 << 0,
    COMPLETE_PATH = 1 << 1,
    INVALID_INPUT = 1 << 2,
    /** the start or end point could not be snapped onto the mesh */
    POINT_OUTSIDE_MESH = 1 << 3,
    /** the end point is not reachable from the start point */
    NO_PATH = 1 << 4,
}

export type FindPathResult = {
    /** whether a complete path was found */
    success: boolean;

    /** the status flags of the pathfinding operation */
    flags: FindPathResultFlags;

    /** the path points, from the snapped start point to the snapped end point */
    path: StraightPathPoint[];

    /** the start triangle */
    startTriangle: number;

    /** the snapped start point */
    startPoint: Vec3;

    /** the end triangle */
    endTriangle: number;

    /** the snapped end point */
    endPoint: Vec3;

    /** the node path result */
    nodePath: FindNodePathResult | null;
};

const _findPathStartNearestResult = createFindNearestTriangleResult();
const _findPathEndNearestResult = createFindNearestTriangleResult();

/**
 * Find a path between two positions on a NavMesh.
 *
 * Internally:
 * - snaps the start and end positions onto the mesh with @see findNearestTriangle
 * - finds a triangle corridor with @see findNodePath
 * - converts the corridor into points with @see findStraightPath or @see findPortalMidpointPath
 *
 * If you want more fine tuned behaviour you can call these methods directly.
 *
 * @param navMesh The navigation mesh.
 * @param start The starting position in world space.
 * @param end The ending position in world space.
 * @param query How the start and end positions are snapped onto the mesh.
 * @param pathMode How the corridor is turned into points.
 * @param queryFilter The query filter.
 * @param straightPathOptions @see FindStraightPathOptions, only used in NavPathMode.ACCURACY
 * @returns The result of the pathfinding operation.
 */
export const findPath = (
    navMesh: NavMesh,
    start: Vec3,
    end: Vec3,
    query: NavQuery = NavQuery.ACCURACY,
    pathMode: NavPathMode = NavPathMode.ACCURACY,
    queryFilter: QueryFilter = DEFAULT_QUERY_FILTER,
    straightPathOptions = 0,
): FindPathResult => {
    const result: FindPathResult = {
        success: false,
        flags: FindPathResultFlags.NONE | FindPathResultFlags.INVALID_INPUT,
        path: [],
        startTriangle: NULL_TRIANGLE,
        startPoint: [0, 0, 0],
        endTriangle: NULL_TRIANGLE,
        endPoint: [0, 0, 0],
        nodePath: null,
    };

    if (!isFiniteVec3(start) || !isFiniteVec3(end)) return result;

    /* snap start */
    const startNearestResult = findNearestTriangle(_findPathStartNearestResult, navMesh, start, query, queryFilter);
    if (!startNearestResult.success) {
        result.flags = FindPathResultFlags.POINT_OUTSIDE_MESH;
        return result;
    }

    vec3.copy(result.startPoint, startNearestResult.point);
    result.startTriangle = startNearestResult.triangleIndex;

    /* snap end */
    const endNearestResult = findNearestTriangle(_findPathEndNearestResult, navMesh, end, query, queryFilter);
    if (!endNearestResult.success) {
        result.flags = FindPathResultFlags.POINT_OUTSIDE_MESH;
        return result;
    }

    vec3.copy(result.endPoint, endNearestResult.point);
    result.endTriangle = endNearestResult.triangleIndex;

    /* same triangle, walk straight there */
    if (result.startTriangle === result.endTriangle) {
        if (vec3.squaredDistance(result.startPoint, result.endPoint) <= SAME_POINT_EPSILON * SAME_POINT_EPSILON) {
            result.path = [
                {
                    position: vec3.clone(result.startPoint),
                    triangleIndex: result.startTriangle,
                    flags: StraightPathPointFlags.START | StraightPathPointFlags.END,
                },
            ];
        } else {
            result.path = [
                { position: vec3.clone(result.startPoint), triangleIndex: result.startTriangle, flags: StraightPathPointFlags.START },
                { position: vec3.clone(result.endPoint), triangleIndex: result.endTriangle, flags: StraightPathPointFlags.END },
            ];
        }

        result.success = true;
        result.flags = FindPathResultFlags.SUCCESS | FindPathResultFlags.COMPLETE_PATH;
        return result;
    }

    /* find node path */
    const nodePath = findNodePath(navMesh, result.startTriangle, result.endTriangle, result.startPoint, result.endPoint, queryFilter);

    result.nodePath = nodePath;

    if (!nodePath.success || (nodePath.flags & FindNodePathResultFlags.COMPLETE_PATH) === 0) {
        result.flags = FindPathResultFlags.NO_PATH;
        return result;
    }

    /* corridor to points */
    const straightPath =
        pathMode === NavPathMode.ACCURACY
            ? findStraightPath(navMesh, result.startPoint, result.endPoint, nodePath.path, straightPathOptions)
            : findPortalMidpointPath(navMesh, result.startPoint, result.endPoint, nodePath.path);

    if (!straightPath.success || straightPath.flags & FindStraightPathResultFlags.PARTIAL_PATH) {
        result.flags = FindPathResultFlags.NO_PATH;
        return result;
    }

    result.success = true;
    result.path = straightPath.path;
    result.flags = FindPathResultFlags.SUCCESS | FindPathResultFlags.COMPLETE_PATH;

    return result;
};

/** The positions of a path's points */
export const getPathPositions = (path: StraightPathPoint[]): Vec3[] => path.map((point) => point.position);
