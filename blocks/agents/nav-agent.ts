import { type Vec3, vec3 } from 'mathcat';
import {
    DEFAULT_QUERY_FILTER,
    type FindPathResult,
    findPath,
    getPathPositions,
    type NavPathMode,
    type NavQuery,
    type QueryFilter,
} from '../../src';
import { getNavMesh, type NavMeshId, type NavMeshRegistry } from '../registry/nav-mesh-registry';

export enum NavAgentState {
    /** no destination, no path */
    IDLE,
    /** computing a path to a new destination */
    SEEKING,
    /** holding a path, moved along it by the agent's driver */
    FOLLOWING,
}

/** Where an agent wants to go: a fixed point, or wherever another agent currently is */
export type NavAgentTarget = { type: 'point'; point: Vec3 } | { type: 'agent'; agentId: string };

export type NavAgentParams = {
    /**
     * Movement speed, in world units per second.
     * @default 0
     */
    speed?: number;

    /**
     * Floor for the per tick look-ahead along the path, in world units per second.
     * @default 1
     */
    minTargetDistance?: number;

    /**
     * Initial heading.
     * @default [1, 0, 0]
     */
    direction?: Vec3;

    /**
     * Tag of the driver moving the agent, @see NavDriver
     * @default 'simple'
     */
    driver?: string;

    /**
     * Query filter used when computing paths for the agent.
     * @default DEFAULT_QUERY_FILTER
     */
    queryFilter?: QueryFilter;
};

export const DEFAULT_MIN_TARGET_DISTANCE = 1;

export type NavAgent = {
    /** agent id */
    id: string;

    /** current position, mutated by the agent's driver */
    position: Vec3;

    /** unit vector, the last movement heading */
    direction: Vec3;

    /** movement speed, in world units per second */
    speed: number;

    /** floor for the per tick look-ahead along the path */
    minTargetDistance: number;

    /** tag selecting the agent's driver */
    driver: string;

    /** query filter used when computing paths */
    queryFilter: QueryFilter;

    /** @see NavAgentState */
    state: NavAgentState;

    /** the point the current path leads to, null when idle */
    destination: Vec3 | null;

    /** the mesh the current path was computed on, null when idle */
    navMeshId: NavMeshId | null;

    /** the path being followed, empty when idle */
    path: Vec3[];

    /** index of the path segment the agent has progressed to */
    pathProgress: number;

    /** outcome of the most recent destination, null until one is set and after a reset or new request */
    lastDestinationResult: SetDestinationResult | null;
};

/**
 * Creates an idle nav agent.
 * @param id the agent id
 * @param position the initial position, copied
 * @param params optional agent parameters
 */
export const createNavAgent = (id: string, position: Vec3, params: NavAgentParams = {}): NavAgent => {
    return {
        id,
        position: vec3.clone(position),
        direction: params.direction ? vec3.clone(params.direction) : [1, 0, 0],
        speed: params.speed ?? 0,
        minTargetDistance: params.minTargetDistance ?? DEFAULT_MIN_TARGET_DISTANCE,
        driver: params.driver ?? 'simple',
        queryFilter: params.queryFilter ?? DEFAULT_QUERY_FILTER,
        state: NavAgentState.IDLE,
        destination: null,
        navMeshId: null,
        path: [],
        pathProgress: 0,
        lastDestinationResult: null,
    };
};

export enum SetDestinationResultFlags {
    NONE = 0,
    SUCCESS = 1 << 0,
    /** the mesh id is not registered */
    UNKNOWN_MESH = 1 << 1,
    /** no path could be found, @see SetDestinationResult.findPathResult */
    PATH_FAILED = 1 << 2,
    /** the followed agent does not exist */
    UNKNOWN_TARGET = 1 << 3,
}

export type SetDestinationResult = {
    success: boolean;
    flags: SetDestinationResultFlags;
    /** the underlying pathfinding result, null if no search ran */
    findPathResult: FindPathResult | null;
};

/**
 * Computes a path from the agent's position to a destination point and starts following it.
 *
 * On success the agent holds the new path, replacing any previous one, and is FOLLOWING.
 * On failure the agent is IDLE with no path and no destination.
 * Either way the result is kept in `agent.lastDestinationResult`.
 */
export const setDestination = (
    agent: NavAgent,
    registry: NavMeshRegistry,
    target: Vec3,
    query: NavQuery,
    pathMode: NavPathMode,
    navMeshId: NavMeshId,
): SetDestinationResult => {
    agent.state = NavAgentState.SEEKING;

    const navMesh = getNavMesh(registry, navMeshId);

    if (!navMesh) {
        return failDestination(agent, { success: false, flags: SetDestinationResultFlags.UNKNOWN_MESH, findPathResult: null });
    }

    const findPathResult = findPath(navMesh, agent.position, target, query, pathMode, agent.queryFilter);

    if (!findPathResult.success) {
        return failDestination(agent, { success: false, flags: SetDestinationResultFlags.PATH_FAILED, findPathResult });
    }

    agent.path = getPathPositions(findPathResult.path).map((position) => vec3.clone(position));
    agent.pathProgress = 0;
    agent.destination = vec3.clone(target);
    agent.navMeshId = navMeshId;
    agent.state = NavAgentState.FOLLOWING;
    agent.lastDestinationResult = { success: true, flags: SetDestinationResultFlags.SUCCESS, findPathResult };

    return agent.lastDestinationResult;
};

/**
 * Records a failed destination on the agent and drops its path, the agent becomes IDLE.
 * @returns the given result
 */
export const failDestination = (agent: NavAgent, result: SetDestinationResult): SetDestinationResult => {
    clearPath(agent);
    agent.lastDestinationResult = result;
    return result;
};

/** Whether the agent's most recent destination failed */
export const hasDestinationFailed = (agent: NavAgent): boolean =>
    agent.lastDestinationResult !== null && !agent.lastDestinationResult.success;

/** Drops the agent's path and destination, the agent becomes IDLE */
export const clearPath = (agent: NavAgent): void => {
    agent.state = NavAgentState.IDLE;
    agent.destination = null;
    agent.navMeshId = null;
    agent.path = [];
    agent.pathProgress = 0;
};

export const hasPath = (agent: NavAgent): boolean => agent.path.length > 0;

/** The path being followed, empty when idle */
export const getAgentPath = (agent: NavAgent): readonly Vec3[] => agent.path;
