import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import { isFiniteVec3 } from '../geometry';
import {
    FindStraightPathResultFlags,
    type FindStraightPathResult,
    type StraightPathPoint,
    StraightPathPointFlags,
} from './find-straight-path';
import type { NavMesh } from './nav-mesh';
import { getClosestPointOnTriangle, getEdgeMidPoint, isValidTriangleIndex } from './nav-mesh-api';

const _midPoint = vec3.create();

const pushPoint = (path: StraightPathPoint[], position: Vec3, triangleIndex: number, flags: number) => {
    const last = path[path.length - 1];
    if (last && vec3.equals(last.position, position)) {
        last.triangleIndex = triangleIndex;
        last.flags |= flags;
        return;
    }
    path.push({ position: vec3.clone(position), triangleIndex, flags });
};

/**
 * Converts a triangle corridor into a path through the midpoints of the shared edges.
 * Cheaper than @see findStraightPath, but the path zig-zags through the corridor.
 *
 * The start and end positions are clamped to the first and last triangles.
 */
export const findPortalMidpointPath = (
    navMesh: NavMesh,
    start: Vec3,
    end: Vec3,
    trianglePath: number[],
): FindStraightPathResult => {
    const path: StraightPathPoint[] = [];

    if (
        !isFiniteVec3(start) ||
        !isFiniteVec3(end) ||
        trianglePath.length === 0 ||
        !trianglePath.every((triangleIndex) => isValidTriangleIndex(navMesh, triangleIndex))
    ) {
        return { flags: FindStraightPathResultFlags.NONE | FindStraightPathResultFlags.INVALID_INPUT, success: false, path };
    }

    const closestStart = getClosestPointOnTriangle(vec3.create(), navMesh, trianglePath[0], start);
    pushPoint(path, closestStart, trianglePath[0], StraightPathPointFlags.START);

    for (let i = 0; i + 1 < trianglePath.length; i++) {
        if (!getEdgeMidPoint(navMesh, trianglePath[i], trianglePath[i + 1], _midPoint)) {
            // broken corridor, stop in the current triangle
            const endClamp = getClosestPointOnTriangle(vec3.create(), navMesh, trianglePath[i], end);
            pushPoint(path, endClamp, trianglePath[i], StraightPathPointFlags.END);

            return {
                flags: FindStraightPathResultFlags.SUCCESS | FindStraightPathResultFlags.PARTIAL_PATH,
                success: true,
                path,
            };
        }

        pushPoint(path, _midPoint, trianglePath[i + 1], 0);
    }

    const lastTriangle = trianglePath[trianglePath.length - 1];
    const closestEnd = getClosestPointOnTriangle(vec3.create(), navMesh, lastTriangle, end);
    pushPoint(path, closestEnd, lastTriangle, StraightPathPointFlags.END);

    return { flags: FindStraightPathResultFlags.SUCCESS, success: true, path };
};
