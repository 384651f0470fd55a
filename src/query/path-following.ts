import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import { closestPointOnSegment, isFiniteVec3 } from '../geometry';

/** Total length of a polyline */
export const getPathLength = (path: Vec3[]): number => {
    let length = 0;
    for (let i = 0; i + 1 < path.length; i++) {
        length += vec3.distance(path[i], path[i + 1]);
    }
    return length;
};

/** writes the point at the given arc length into out and returns the index of the segment holding it */
const pointAtDistance = (out: Vec3, path: Vec3[], distance: number): number => {
    if (path.length === 1 || distance <= 0) {
        vec3.copy(out, path[0]);
        return 0;
    }

    let travelled = 0;

    for (let i = 0; i + 1 < path.length; i++) {
        const segmentLength = vec3.distance(path[i], path[i + 1]);

        if (travelled + segmentLength >= distance) {
            const t = segmentLength > 0 ? (distance - travelled) / segmentLength : 0;
            vec3.lerp(out, path[i], path[i + 1], t);
            return i;
        }

        travelled += segmentLength;
    }

    vec3.copy(out, path[path.length - 1]);
    return path.length - 2;
};

/**
 * Gets the point at the given arc length along a path, clamped to the path's ends.
 * @returns out, unchanged for an empty path
 */
export const getPointAtDistance = (out: Vec3, path: Vec3[], distance: number): Vec3 => {
    if (path.length === 0) return out;
    pointAtDistance(out, path, distance);
    return out;
};

export type ProjectOnPathResult = {
    success: boolean;
    /** the closest point on the path */
    point: Vec3;
    /** the segment holding the closest point */
    segmentIndex: number;
    /** arc length from the start of the path to the closest point */
    distanceAlongPath: number;
    /** distance from the projected position to the closest point */
    distance: number;
};

export const createProjectOnPathResult = (): ProjectOnPathResult => ({
    success: false,
    point: [0, 0, 0],
    segmentIndex: 0,
    distanceAlongPath: 0,
    distance: Infinity,
});

const _projectClosest = vec3.create();

/**
 * Projects a position onto the closest segment of a path at or after `startSegment`.
 * Ties go to the earlier segment.
 */
export const projectOnPath = (
    result: ProjectOnPathResult,
    path: Vec3[],
    position: Vec3,
    startSegment = 0,
): ProjectOnPathResult => {
    result.success = false;
    result.segmentIndex = 0;
    result.distanceAlongPath = 0;
    result.distance = Infinity;

    if (path.length === 0 || !isFiniteVec3(position)) return result;

    result.success = true;

    if (path.length === 1) {
        vec3.copy(result.point, path[0]);
        result.distance = vec3.distance(position, path[0]);
        return result;
    }

    const firstSegment = Math.min(Math.max(Math.floor(startSegment), 0), path.length - 2);

    let arcLength = 0;
    for (let i = 0; i < firstSegment; i++) {
        arcLength += vec3.distance(path[i], path[i + 1]);
    }

    for (let i = firstSegment; i + 1 < path.length; i++) {
        const a = path[i];
        const b = path[i + 1];
        const segmentLength = vec3.distance(a, b);

        const t = closestPointOnSegment(_projectClosest, position, a, b);
        const distance = vec3.distance(position, _projectClosest);

        if (distance < result.distance) {
            result.distance = distance;
            result.segmentIndex = i;
            result.distanceAlongPath = arcLength + t * segmentLength;
            vec3.copy(result.point, _projectClosest);
        }

        arcLength += segmentLength;
    }

    return result;
};

export type AdvanceAlongPathResult = {
    success: boolean;
    /** the point to move toward */
    point: Vec3;
    /** the part of maxDistance left over after reaching the end of the path */
    remainingDistance: number;
    /** the segment holding the returned point, to pass back as startSegment on the next call */
    segmentIndex: number;
    /** arc length from the start of the path to the returned point */
    distanceAlongPath: number;
    /** whether the returned point is the end of the path */
    arrived: boolean;
};

export const createAdvanceAlongPathResult = (): AdvanceAlongPathResult => ({
    success: false,
    point: [0, 0, 0],
    remainingDistance: 0,
    segmentIndex: 0,
    distanceAlongPath: 0,
    arrived: false,
});

const _advanceProjectResult = createProjectOnPathResult();

/**
 * Finds the point `maxDistance` further along a path than the projection of `position` onto it.
 *
 * Past the end of the path the final point is returned, with the unused distance in `remainingDistance`.
 * Fails for an empty path, a non positive `maxDistance`, or when `position` is farther than
 * `maxOffPathDistance` from the path. The path is never modified.
 *
 * @param startSegment segments before this one are ignored when projecting `position`
 */
export const advanceAlongPath = (
    result: AdvanceAlongPathResult,
    path: Vec3[],
    position: Vec3,
    maxDistance: number,
    startSegment = 0,
    maxOffPathDistance = Infinity,
): AdvanceAlongPathResult => {
    result.success = false;
    result.remainingDistance = 0;
    result.segmentIndex = 0;
    result.distanceAlongPath = 0;
    result.arrived = false;

    if (path.length === 0 || !Number.isFinite(maxDistance) || maxDistance <= 0) return result;

    const projection = projectOnPath(_advanceProjectResult, path, position, startSegment);
    if (!projection.success || projection.distance > maxOffPathDistance) return result;

    const totalLength = getPathLength(path);
    const targetDistance = projection.distanceAlongPath + maxDistance;

    result.success = true;

    if (targetDistance >= totalLength) {
        vec3.copy(result.point, path[path.length - 1]);
        result.remainingDistance = targetDistance - totalLength;
        result.segmentIndex = Math.max(path.length - 2, 0);
        result.distanceAlongPath = totalLength;
        result.arrived = true;
        return result;
    }

    result.segmentIndex = pointAtDistance(result.point, path, targetDistance);
    result.distanceAlongPath = targetDistance;

    return result;
};
