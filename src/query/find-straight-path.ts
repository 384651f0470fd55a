import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import {
    createDistancePtSegSqr2dResult,
    createIntersectSegSeg2DResult,
    distancePtSegSqr2d,
    type IntersectSegSeg2DResult,
    intersectSegSeg2D,
    isFiniteVec3,
    triArea2D,
} from '../geometry';
import { type NavMesh, NULL_TRIANGLE } from './nav-mesh';
import { getClosestPointOnTriangle, getPortalPoints, isValidTriangleIndex } from './nav-mesh-api';

export enum FindStraightPathOptions {
    /** emit a point wherever a straight segment crosses a portal */
    ALL_CROSSINGS = 1,
}

export enum StraightPathPointFlags {
    START = 1,
    END = 2,
    /** a portal crossing, only emitted with FindStraightPathOptions.ALL_CROSSINGS */
    CROSSING = 4,
}

export type StraightPathPoint = {
    position: Vec3;
    /** the triangle the path enters at this point, or the triangle it ends in */
    triangleIndex: number;
    /** @see StraightPathPointFlags */
    flags: number;
};

export enum FindStraightPathResultFlags {
    NONE = 0,
    SUCCESS = 1 << 0,
    PARTIAL_PATH = 1 << 2,
    INVALID_INPUT = 1 << 4,
}

export type FindStraightPathResult = {
    flags: FindStraightPathResultFlags;
    success: boolean;
    path: StraightPathPoint[];
};

const appendVertex = (position: Vec3, triangleIndex: number, flags: number, outPoints: StraightPathPoint[]): void => {
    const last = outPoints[outPoints.length - 1];

    if (last && vec3.equals(last.position, position)) {
        // the vertices are equal, update. a crossing never overrides a start or end point
        last.triangleIndex = triangleIndex;
        last.flags |= flags & ~StraightPathPointFlags.CROSSING;
        return;
    }

    outPoints.push({
        position: [position[0], position[1], position[2]],
        triangleIndex,
        flags,
    });
};

const _intersectSegSeg2DResult: IntersectSegSeg2DResult = createIntersectSegSeg2DResult();

const _appendPortalsStart = vec3.create();
const _appendPortalsPoint = vec3.create();
const _appendPortalsLeft = vec3.create();
const _appendPortalsRight = vec3.create();

const appendPortals = (
    navMesh: NavMesh,
    startIdx: number,
    endIdx: number,
    endPosition: Vec3,
    path: number[],
    outPoints: StraightPathPoint[],
): void => {
    const startPos = vec3.copy(_appendPortalsStart, outPoints[outPoints.length - 1].position);

    for (let i = startIdx; i < endIdx; i++) {
        const from = path[i];
        const to = path[i + 1];

        // calculate portal
        const left = _appendPortalsLeft;
        const right = _appendPortalsRight;
        if (!getPortalPoints(navMesh, from, to, left, right)) {
            break;
        }

        // append intersection
        const intersectResult = intersectSegSeg2D(_intersectSegSeg2DResult, startPos, endPosition, left, right, navMesh.planeAxes);

        if (!intersectResult.hit) continue;

        const point = vec3.lerp(_appendPortalsPoint, left, right, intersectResult.t);

        appendVertex(point, to, StraightPathPointFlags.CROSSING, outPoints);
    }
};

const _findStraightPathLeftPortalPoint = vec3.create();
const _findStraightPathRightPortalPoint = vec3.create();
const _findStraightPath_distancePtSegSqr2dResult = createDistancePtSegSqr2dResult();

const makeFindStraightPathResult = (flags: FindStraightPathResultFlags, path: StraightPathPoint[]): FindStraightPathResult => ({
    flags,
    success: (flags & FindStraightPathResultFlags.SUCCESS) !== 0,
    path,
});

/**
 * This method peforms what is often called 'string pulling'.
 *
 * The start position is clamped to the first triangle in the path, and the
 * end position is clamped to the last. So the start and end positions should
 * normally be within or very near the first and last triangles respectively.
 *
 * The result is the shortest path from start to end that stays inside the triangle corridor.
 *
 * @param navMesh The navigation mesh to use for the search.
 * @param start The start position in world space.
 * @param end The end position in world space.
 * @param trianglePath The triangle corridor, generally obtained from `findNodePath`
 * @param straightPathOptions @see FindStraightPathOptions
 * @returns The straight path
 */
export const findStraightPath = (
    navMesh: NavMesh,
    start: Vec3,
    end: Vec3,
    trianglePath: number[],
    straightPathOptions = 0,
): FindStraightPathResult => {
    const path: StraightPathPoint[] = [];

    if (!isFiniteVec3(start) || !isFiniteVec3(end) || trianglePath.length === 0) {
        return makeFindStraightPathResult(FindStraightPathResultFlags.NONE | FindStraightPathResultFlags.INVALID_INPUT, path);
    }

    for (const triangleIndex of trianglePath) {
        if (!isValidTriangleIndex(navMesh, triangleIndex)) {
            return makeFindStraightPathResult(FindStraightPathResultFlags.NONE | FindStraightPathResultFlags.INVALID_INPUT, path);
        }
    }

    const axes = navMesh.planeAxes;
    const appendCrossings = (straightPathOptions & FindStraightPathOptions.ALL_CROSSINGS) !== 0;

    // clamp start & end to the first and last triangles
    const closestStartPos = getClosestPointOnTriangle(vec3.create(), navMesh, trianglePath[0], start);
    const closestEndPos = getClosestPointOnTriangle(vec3.create(), navMesh, trianglePath[trianglePath.length - 1], end);

    // add start point
    appendVertex(closestStartPos, trianglePath[0], StraightPathPointFlags.START, path);

    const portalApex = vec3.create();
    const portalLeft = vec3.create();
    const portalRight = vec3.create();

    const pathSize = trianglePath.length;

    if (pathSize > 1) {
        vec3.copy(portalApex, closestStartPos);
        vec3.copy(portalLeft, portalApex);
        vec3.copy(portalRight, portalApex);

        let apexIndex = 0;
        let leftIndex = 0;
        let rightIndex = 0;

        let leftTriangle = trianglePath[0];
        let rightTriangle = trianglePath[0];

        for (let i = 0; i < pathSize; ++i) {
            const left = _findStraightPathLeftPortalPoint;
            const right = _findStraightPathRightPortalPoint;

            if (i + 1 < pathSize) {
                // next portal
                if (!getPortalPoints(navMesh, trianglePath[i], trianglePath[i + 1], left, right)) {
                    // the corridor is broken here, clamp end to the current triangle and return partial
                    const endClamp = getClosestPointOnTriangle(vec3.create(), navMesh, trianglePath[i], end);

                    if (appendCrossings) {
                        appendPortals(navMesh, apexIndex, i, endClamp, trianglePath, path);
                    }

                    appendVertex(endClamp, trianglePath[i], StraightPathPointFlags.END, path);

                    return makeFindStraightPathResult(
                        FindStraightPathResultFlags.SUCCESS | FindStraightPathResultFlags.PARTIAL_PATH,
                        path,
                    );
                }

                if (i === 0) {
                    // if starting really close to the portal, advance
                    const result = distancePtSegSqr2d(_findStraightPath_distancePtSegSqr2dResult, portalApex, left, right, axes);
                    if (result.distSqr < 1e-6) continue;
                }
            } else {
                // end of path
                vec3.copy(left, closestEndPos);
                vec3.copy(right, closestEndPos);
            }

            const nextTriangle = i + 1 < pathSize ? trianglePath[i + 1] : NULL_TRIANGLE;

            // right vertex
            if (triArea2D(portalApex, portalRight, right, axes) >= 0.0) {
                if (vec3.equals(portalApex, portalRight) || triArea2D(portalApex, portalLeft, right, axes) < 0.0) {
                    // tighten the funnel
                    vec3.copy(portalRight, right);
                    rightTriangle = nextTriangle;
                    rightIndex = i;
                } else {
                    // right over left, the left point becomes the new apex
                    if (appendCrossings) {
                        appendPortals(navMesh, apexIndex, leftIndex, portalLeft, trianglePath, path);
                    }

                    vec3.copy(portalApex, portalLeft);
                    apexIndex = leftIndex;

                    if (leftTriangle === NULL_TRIANGLE) {
                        appendVertex(portalApex, trianglePath[pathSize - 1], StraightPathPointFlags.END, path);
                    } else {
                        appendVertex(portalApex, leftTriangle, 0, path);
                    }

                    vec3.copy(portalLeft, portalApex);
                    vec3.copy(portalRight, portalApex);
                    leftIndex = apexIndex;
                    rightIndex = apexIndex;

                    // restart
                    i = apexIndex;

                    continue;
                }
            }

            // left vertex
            if (triArea2D(portalApex, portalLeft, left, axes) <= 0.0) {
                if (vec3.equals(portalApex, portalLeft) || triArea2D(portalApex, portalRight, left, axes) > 0.0) {
                    // tighten the funnel
                    vec3.copy(portalLeft, left);
                    leftTriangle = nextTriangle;
                    leftIndex = i;
                } else {
                    // left over right, the right point becomes the new apex
                    if (appendCrossings) {
                        appendPortals(navMesh, apexIndex, rightIndex, portalRight, trianglePath, path);
                    }

                    vec3.copy(portalApex, portalRight);
                    apexIndex = rightIndex;

                    if (rightTriangle === NULL_TRIANGLE) {
                        appendVertex(portalApex, trianglePath[pathSize - 1], StraightPathPointFlags.END, path);
                    } else {
                        appendVertex(portalApex, rightTriangle, 0, path);
                    }

                    vec3.copy(portalLeft, portalApex);
                    vec3.copy(portalRight, portalApex);
                    leftIndex = apexIndex;
                    rightIndex = apexIndex;

                    // restart
                    i = apexIndex;

                    continue;
                }
            }
        }

        // append portals along the current straight path segment
        if (appendCrossings) {
            appendPortals(navMesh, apexIndex, pathSize - 1, closestEndPos, trianglePath, path);
        }
    }

    // append end point
    appendVertex(closestEndPos, trianglePath[pathSize - 1], StraightPathPointFlags.END, path);

    return makeFindStraightPathResult(FindStraightPathResultFlags.SUCCESS, path);
};
