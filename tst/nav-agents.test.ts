import pino from 'pino';
import { describe, expect, test } from 'vitest';
import { hasDestinationFailed, NavAgentState, SetDestinationResultFlags } from '../blocks/agents/nav-agent';
import {
    addNavAgent,
    createNavAgents,
    getNavAgent,
    isNavAgentAtTarget,
    removeNavAgent,
    requestDestination,
    resetDestination,
    updateNavAgents,
} from '../blocks/agents/nav-agents';
import { createNavMeshRegistry, registerNavMesh } from '../blocks/registry/nav-mesh-registry';
import { FindPathResultFlags, NavPathMode, NavQuery } from '../src';
import { createIslandsNavMesh, createStripNavMesh } from './meshes';

const createCapturingLogger = () => {
    const lines: Array<Record<string, unknown>> = [];
    const logger = pino({ level: 'warn' }, { write: (msg: string) => lines.push(JSON.parse(msg)) });
    return { logger, lines };
};

const setup = () => {
    const registry = createNavMeshRegistry();
    const navMeshId = registerNavMesh(registry, createStripNavMesh());
    const { logger, lines } = createCapturingLogger();
    const agents = createNavAgents({ logger });
    return { registry, navMeshId, agents, lines };
};

describe('NavAgents', () => {
    test('walks an agent to a point and stops it there', () => {
        const { registry, navMeshId, agents, lines } = setup();
        const agentId = addNavAgent(agents, [1, 5, 0], { speed: 5 });

        expect(
            requestDestination(agents, agentId, { type: 'point', point: [29, 5, 0] }, NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId),
        ).toBe(true);

        // the path is computed on the next update
        expect(agents.agents[agentId].state).toBe(NavAgentState.IDLE);

        for (let i = 0; i < 5; i++) {
            updateNavAgents(agents, registry, 1);
        }

        const agent = agents.agents[agentId];
        expect(agent.state).toBe(NavAgentState.FOLLOWING);
        expect(agent.position[0]).toBeCloseTo(26);
        expect(agent.position[1]).toBeCloseTo(5);
        expect(agents.requests[agentId]).toBeUndefined();
        expect(isNavAgentAtTarget(agents, agentId)).toBe(false);
        expect(isNavAgentAtTarget(agents, agentId, 3.5)).toBe(true);

        updateNavAgents(agents, registry, 1);

        expect(agent.state).toBe(NavAgentState.IDLE);
        expect(agent.position[0]).toBeCloseTo(29);
        expect(agent.position[1]).toBeCloseTo(5);
        expect(agent.path).toEqual([]);
        expect(agent.lastDestinationResult?.success).toBe(true);
        expect(hasDestinationFailed(agent)).toBe(false);
        expect(lines).toEqual([]);
    });

    test('clears the destination when the followed agent is removed', () => {
        const { registry, navMeshId, agents, lines } = setup();
        const follower = addNavAgent(agents, [1, 5, 0], { speed: 5 });
        const leader = addNavAgent(agents, [29, 5, 0]);

        requestDestination(agents, follower, { type: 'agent', agentId: leader }, NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId);

        updateNavAgents(agents, registry, 1);

        expect(agents.agents[follower].state).toBe(NavAgentState.FOLLOWING);
        expect(agents.agents[follower].destination).toEqual([29, 5, 0]);
        expect(agents.requests[follower]).toBeDefined();

        expect(removeNavAgent(agents, leader)).toBe(true);

        updateNavAgents(agents, registry, 1);

        expect(agents.agents[follower].state).toBe(NavAgentState.IDLE);
        expect(agents.requests[follower]).toBeUndefined();
        expect(lines.length).toBe(1);
        expect(lines[0].msg).toBe('followed agent does not exist, clearing destination');
        expect(lines[0].followedAgentId).toBe(leader);
        expect(agents.agents[follower].lastDestinationResult?.flags).toBe(SetDestinationResultFlags.UNKNOWN_TARGET);
    });

    test('re-plans toward a moving agent at the replan interval', () => {
        const { registry, navMeshId, agents } = setup();
        const follower = addNavAgent(agents, [1, 5, 0], { speed: 1 });
        const leader = addNavAgent(agents, [29, 5, 0]);

        requestDestination(agents, follower, { type: 'agent', agentId: leader }, NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId);
        updateNavAgents(agents, registry, 0.5);

        agents.agents[leader].position = [20, 5, 0];

        updateNavAgents(agents, registry, 0.5);
        expect(agents.agents[follower].destination).toEqual([29, 5, 0]);

        updateNavAgents(agents, registry, 0.5);
        expect(agents.agents[follower].destination).toEqual([20, 5, 0]);
    });

    test('logs and drops a request for an unknown mesh', () => {
        const { registry, agents, lines } = setup();
        const agentId = addNavAgent(agents, [1, 5, 0], { speed: 5 });

        requestDestination(agents, agentId, { type: 'point', point: [29, 5, 0] }, NavQuery.ACCURACY, NavPathMode.ACCURACY, 'missing');
        updateNavAgents(agents, registry, 1);

        expect(agents.agents[agentId].state).toBe(NavAgentState.IDLE);
        expect(agents.requests[agentId]).toBeUndefined();
        expect(lines.length).toBe(1);
        expect(lines[0].msg).toBe('failed to set agent destination');
        expect(lines[0].agentId).toBe(agentId);
        expect(lines[0].navMeshId).toBe('missing');
        expect(lines[0].flags).toBe(SetDestinationResultFlags.UNKNOWN_MESH);
        expect(agents.agents[agentId].lastDestinationResult).toEqual({
            success: false,
            flags: SetDestinationResultFlags.UNKNOWN_MESH,
            findPathResult: null,
        });
    });

    test('records a failed path to another island on the agent', () => {
        const { registry, agents, lines } = setup();
        const islandsId = registerNavMesh(registry, createIslandsNavMesh());
        const agentId = addNavAgent(agents, [1, 1, 0], { speed: 5 });

        requestDestination(agents, agentId, { type: 'point', point: [101, 1, 0] }, NavQuery.ACCURACY, NavPathMode.FAST, islandsId);
        updateNavAgents(agents, registry, 1);

        const agent = agents.agents[agentId];
        expect(agent.state).toBe(NavAgentState.IDLE);
        expect(hasDestinationFailed(agent)).toBe(true);
        expect(agent.lastDestinationResult?.flags).toBe(SetDestinationResultFlags.PATH_FAILED);
        expect(agent.lastDestinationResult?.findPathResult?.flags).toBe(FindPathResultFlags.NO_PATH);
        expect(lines.length).toBe(1);
        expect(lines[0].flags).toBe(SetDestinationResultFlags.PATH_FAILED);
        expect(lines[0].findPathFlags).toBe(FindPathResultFlags.NO_PATH);
    });

    test('a new request clears the recorded failure', () => {
        const { registry, navMeshId, agents } = setup();
        const agentId = addNavAgent(agents, [1, 5, 0], { speed: 5 });

        requestDestination(agents, agentId, { type: 'point', point: [29, 5, 0] }, NavQuery.ACCURACY, NavPathMode.ACCURACY, 'missing');
        updateNavAgents(agents, registry, 1);
        expect(hasDestinationFailed(agents.agents[agentId])).toBe(true);

        requestDestination(agents, agentId, { type: 'point', point: [29, 5, 0] }, NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId);
        expect(agents.agents[agentId].lastDestinationResult).toBe(null);

        updateNavAgents(agents, registry, 1);
        expect(agents.agents[agentId].state).toBe(NavAgentState.FOLLOWING);
        expect(hasDestinationFailed(agents.agents[agentId])).toBe(false);
    });

    test('requests for unknown agents are rejected', () => {
        const { navMeshId, agents } = setup();

        expect(
            requestDestination(agents, 'missing', { type: 'point', point: [29, 5, 0] }, NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId),
        ).toBe(false);
        expect(resetDestination(agents, 'missing')).toBe(false);
        expect(removeNavAgent(agents, 'missing')).toBe(false);
    });

    test('object prototype keys are not agents', () => {
        const { registry, navMeshId, agents, lines } = setup();
        addNavAgent(agents, [1, 5, 0]);

        expect(getNavAgent(agents, 'toString')).toBeUndefined();
        expect(
            requestDestination(agents, 'toString', { type: 'point', point: [29, 5, 0] }, NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId),
        ).toBe(false);
        expect(resetDestination(agents, 'constructor')).toBe(false);
        expect(removeNavAgent(agents, 'hasOwnProperty')).toBe(false);
        expect(isNavAgentAtTarget(agents, 'valueOf')).toBe(false);

        expect(() => updateNavAgents(agents, registry, 1)).not.toThrow();
        expect(Object.keys(agents.requests)).toEqual([]);
        expect(lines).toEqual([]);
    });

    test('following an object prototype key fails as an unknown agent', () => {
        const { registry, navMeshId, agents, lines } = setup();
        const agentId = addNavAgent(agents, [1, 5, 0], { speed: 5 });

        requestDestination(agents, agentId, { type: 'agent', agentId: 'toString' }, NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId);
        updateNavAgents(agents, registry, 1);

        expect(agents.agents[agentId].state).toBe(NavAgentState.IDLE);
        expect(agents.agents[agentId].lastDestinationResult?.flags).toBe(SetDestinationResultFlags.UNKNOWN_TARGET);
        expect(agents.requests[agentId]).toBeUndefined();
        expect(lines.length).toBe(1);
        expect(lines[0].followedAgentId).toBe('toString');
    });

    test('an object prototype key is not a driver', () => {
        const { registry, navMeshId, agents, lines } = setup();
        const agentId = addNavAgent(agents, [1, 5, 0], { speed: 5, driver: 'constructor' });

        requestDestination(agents, agentId, { type: 'point', point: [29, 5, 0] }, NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId);
        updateNavAgents(agents, registry, 1);

        expect(agents.agents[agentId].state).toBe(NavAgentState.FOLLOWING);
        expect(agents.agents[agentId].position).toEqual([1, 5, 0]);
        expect(lines.length).toBe(1);
        expect(lines[0].msg).toBe('no driver registered for agent');
        expect(lines[0].driver).toBe('constructor');
    });

    test('resetDestination stops the agent', () => {
        const { registry, navMeshId, agents } = setup();
        const agentId = addNavAgent(agents, [1, 5, 0], { speed: 5 });

        requestDestination(agents, agentId, { type: 'point', point: [29, 5, 0] }, NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId);
        updateNavAgents(agents, registry, 1);

        expect(resetDestination(agents, agentId)).toBe(true);
        expect(agents.agents[agentId].state).toBe(NavAgentState.IDLE);

        updateNavAgents(agents, registry, 1);

        expect(agents.agents[agentId].position[0]).toBeCloseTo(6);
    });

    test('agent ids are sequential', () => {
        const { agents } = setup();

        expect(addNavAgent(agents, [0, 0, 0])).toBe('0');
        expect(addNavAgent(agents, [0, 0, 0])).toBe('1');
    });
});
