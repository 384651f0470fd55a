import type { Logger } from 'pino';
import { type Vec3, vec3 } from 'mathcat';
import type { NavPathMode, NavQuery } from '../../src';
import { logger as defaultLogger } from '../logger';
import type { NavMeshId, NavMeshRegistry } from '../registry/nav-mesh-registry';
import {
    clearPath,
    createNavAgent,
    failDestination,
    type NavAgent,
    type NavAgentParams,
    NavAgentState,
    type NavAgentTarget,
    SetDestinationResultFlags,
    setDestination,
} from './nav-agent';
import { DEFAULT_NAV_DRIVERS, type NavDriver } from './nav-driver';

export type NavAgentsParams = {
    /**
     * Logger for destination failures.
     * @default the module logger, level from LOG_LEVEL
     */
    logger?: Logger;

    /**
     * Seconds between re-plans for agents following another agent.
     * @default 1
     */
    followReplanInterval?: number;

    /**
     * Distance to the end of the path at which an agent has arrived.
     * @default 0.01
     */
    arrivalThreshold?: number;

    /**
     * Drivers by tag.
     * @default DEFAULT_NAV_DRIVERS
     */
    drivers?: Record<string, NavDriver>;
};

export const DEFAULT_FOLLOW_REPLAN_INTERVAL = 1;
export const DEFAULT_ARRIVAL_THRESHOLD = 0.01;

type DestinationRequest = {
    target: NavAgentTarget;
    query: NavQuery;
    pathMode: NavPathMode;
    navMeshId: NavMeshId;
    /** whether a path should be computed on the next update */
    pending: boolean;
    /** seconds since the last plan, for agent targets */
    replanTime: number;
};

export type NavAgents = {
    agents: Record<string, NavAgent>;
    agentIdCounter: number;
    requests: Record<string, DestinationRequest>;
    drivers: Record<string, NavDriver>;
    followReplanInterval: number;
    arrivalThreshold: number;
    logger: Logger;
};

/**
 * Creates a new agent collection
 * @param params optional collection parameters
 */
export const createNavAgents = (params: NavAgentsParams = {}): NavAgents => {
    return {
        agents: {},
        agentIdCounter: 0,
        requests: {},
        drivers: params.drivers ?? DEFAULT_NAV_DRIVERS,
        followReplanInterval: params.followReplanInterval ?? DEFAULT_FOLLOW_REPLAN_INTERVAL,
        arrivalThreshold: params.arrivalThreshold ?? DEFAULT_ARRIVAL_THRESHOLD,
        logger: params.logger ?? defaultLogger,
    };
};

/** Looks up an agent by id, undefined if unknown */
export const getNavAgent = (agents: NavAgents, agentId: string): NavAgent | undefined => {
    return Object.hasOwn(agents.agents, agentId) ? agents.agents[agentId] : undefined;
};

/**
 * Adds an idle agent.
 * @returns the ID of the added agent
 */
export const addNavAgent = (agents: NavAgents, position: Vec3, params: NavAgentParams = {}): string => {
    const agentId = String(agents.agentIdCounter++);
    agents.agents[agentId] = createNavAgent(agentId, position, params);
    return agentId;
};

/**
 * Removes an agent and its destination request.
 * @returns true if the agent was removed, false otherwise
 */
export const removeNavAgent = (agents: NavAgents, agentId: string): boolean => {
    if (getNavAgent(agents, agentId)) {
        delete agents.agents[agentId];
        delete agents.requests[agentId];
        return true;
    }
    return false;
};

/**
 * Requests a destination for an agent. The path is computed on the next update.
 * Clears the agent's `lastDestinationResult`; a failure while planning is recorded there.
 * @returns true if the request was stored, false if the agent is unknown
 */
export const requestDestination = (
    agents: NavAgents,
    agentId: string,
    target: NavAgentTarget,
    query: NavQuery,
    pathMode: NavPathMode,
    navMeshId: NavMeshId,
): boolean => {
    const agent = getNavAgent(agents, agentId);
    if (!agent) return false;

    agent.lastDestinationResult = null;

    agents.requests[agentId] = {
        target: target.type === 'point' ? { type: 'point', point: vec3.clone(target.point) } : { ...target },
        query,
        pathMode,
        navMeshId,
        pending: true,
        replanTime: 0,
    };

    return true;
};

/**
 * Drops an agent's destination request and path.
 * @returns true if the agent exists
 */
export const resetDestination = (agents: NavAgents, agentId: string): boolean => {
    const agent = getNavAgent(agents, agentId);
    if (!agent) return false;

    delete agents.requests[agentId];
    clearPath(agent);
    agent.lastDestinationResult = null;

    return true;
};

const updateDestinationRequests = (agents: NavAgents, registry: NavMeshRegistry, deltaTime: number): void => {
    for (const agentId in agents.requests) {
        const request = agents.requests[agentId];
        const agent = getNavAgent(agents, agentId);

        if (!agent) {
            delete agents.requests[agentId];
            continue;
        }

        // moving targets are planned against a snapshot of their position, at a fixed cadence
        if (request.target.type === 'agent') {
            request.replanTime += deltaTime;
            if (request.replanTime >= agents.followReplanInterval) {
                request.pending = true;
            }
        }

        if (!request.pending) continue;

        let point: Vec3;

        if (request.target.type === 'point') {
            point = request.target.point;
        } else {
            const followed = getNavAgent(agents, request.target.agentId);

            if (!followed) {
                agents.logger.warn(
                    { agentId, followedAgentId: request.target.agentId },
                    'followed agent does not exist, clearing destination',
                );
                delete agents.requests[agentId];
                failDestination(agent, { success: false, flags: SetDestinationResultFlags.UNKNOWN_TARGET, findPathResult: null });
                continue;
            }

            point = vec3.clone(followed.position);

            agents.logger.debug({ agentId, followedAgentId: request.target.agentId, point }, 're-planning toward followed agent');
        }

        const result = setDestination(agent, registry, point, request.query, request.pathMode, request.navMeshId);

        if (!result.success) {
            agents.logger.warn(
                {
                    agentId,
                    navMeshId: request.navMeshId,
                    flags: result.flags,
                    findPathFlags: result.findPathResult?.flags,
                },
                'failed to set agent destination',
            );
            delete agents.requests[agentId];
            continue;
        }

        if (request.target.type === 'point') {
            delete agents.requests[agentId];
        } else {
            request.pending = false;
            request.replanTime = 0;
        }
    }
};

const updateDrivers = (agents: NavAgents, deltaTime: number): void => {
    for (const agentId in agents.agents) {
        const agent = agents.agents[agentId];
        if (agent.state !== NavAgentState.FOLLOWING) continue;

        const driver = Object.hasOwn(agents.drivers, agent.driver) ? agents.drivers[agent.driver] : undefined;

        if (!driver) {
            agents.logger.warn({ agentId, driver: agent.driver }, 'no driver registered for agent');
            continue;
        }

        driver.update(agent, deltaTime);
    }
};

const updateArrivals = (agents: NavAgents): void => {
    for (const agentId in agents.agents) {
        if (isNavAgentAtTarget(agents, agentId)) {
            clearPath(agents.agents[agentId]);
        }
    }
};

/**
 * Updates the agent collection:
 * - computes paths for pending destination requests, re-planning agent follow targets periodically,
 *   failures are logged and kept in each agent's `lastDestinationResult`
 * - runs each following agent's driver
 * - clears the paths of agents that arrived
 *
 * @param agents the agent collection
 * @param registry the nav meshes agents path on
 * @param deltaTime elapsed time in seconds
 */
export const updateNavAgents = (agents: NavAgents, registry: NavMeshRegistry, deltaTime: number): void => {
    // handle destination requests since last update
    updateDestinationRequests(agents, registry, deltaTime);

    // move agents along their paths
    updateDrivers(agents, deltaTime);

    // stop agents at the end of their paths
    updateArrivals(agents);
};

/**
 * Check if an agent is following a path and within `threshold` of its final point.
 *
 * @param agents the agent collection
 * @param agentId the agent id
 * @param threshold distance threshold to consider "at target"
 */
export const isNavAgentAtTarget = (agents: NavAgents, agentId: string, threshold = agents.arrivalThreshold): boolean => {
    const agent = getNavAgent(agents, agentId);
    if (!agent) return false;

    if (agent.state !== NavAgentState.FOLLOWING || agent.path.length === 0) return false;

    const endPosition = agent.path[agent.path.length - 1];

    return vec3.distance(agent.position, endPosition) <= threshold;
};
