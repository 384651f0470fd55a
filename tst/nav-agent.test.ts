import { describe, expect, test } from 'vitest';
import {
    clearPath,
    createNavAgent,
    getAgentPath,
    hasDestinationFailed,
    hasPath,
    NavAgentState,
    SetDestinationResultFlags,
    setDestination,
} from '../blocks/agents/nav-agent';
import { createNavMeshRegistry, registerNavMesh } from '../blocks/registry/nav-mesh-registry';
import { FindPathResultFlags, NavPathMode, NavQuery } from '../src';
import { createIslandsNavMesh, createStripNavMesh } from './meshes';

describe('createNavAgent', () => {
    test('creates an idle agent with defaults', () => {
        const position: [number, number, number] = [1, 5, 0];
        const agent = createNavAgent('a', position);

        position[0] = 100;

        expect(agent.position).toEqual([1, 5, 0]);
        expect(agent.state).toBe(NavAgentState.IDLE);
        expect(agent.speed).toBe(0);
        expect(agent.minTargetDistance).toBe(1);
        expect(agent.driver).toBe('simple');
        expect(agent.destination).toBe(null);
        expect(agent.lastDestinationResult).toBe(null);
        expect(hasPath(agent)).toBe(false);
    });
});

describe('setDestination', () => {
    test('computes a path and starts following it', () => {
        const registry = createNavMeshRegistry();
        const navMeshId = registerNavMesh(registry, createStripNavMesh());
        const agent = createNavAgent('a', [1, 5, 0], { speed: 5 });

        const result = setDestination(agent, registry, [29, 5, 0], NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId);

        expect(result.success).toBe(true);
        expect(result.flags).toBe(SetDestinationResultFlags.SUCCESS);
        expect(agent.state).toBe(NavAgentState.FOLLOWING);
        expect(agent.destination).toEqual([29, 5, 0]);
        expect(agent.navMeshId).toBe(navMeshId);
        expect(agent.pathProgress).toBe(0);

        const path = getAgentPath(agent);
        expect(path.length).toBe(2);
        expect(path[0][0]).toBeCloseTo(1);
        expect(path[0][1]).toBeCloseTo(5);
        expect(path[1][0]).toBeCloseTo(29);
        expect(path[1][1]).toBeCloseTo(5);
    });

    test('fails for an unknown mesh', () => {
        const registry = createNavMeshRegistry();
        const agent = createNavAgent('a', [1, 5, 0]);

        const result = setDestination(agent, registry, [29, 5, 0], NavQuery.ACCURACY, NavPathMode.ACCURACY, 'missing');

        expect(result).toEqual({ success: false, flags: SetDestinationResultFlags.UNKNOWN_MESH, findPathResult: null });
        expect(agent.state).toBe(NavAgentState.IDLE);
        expect(agent.lastDestinationResult).toBe(result);
        expect(hasDestinationFailed(agent)).toBe(true);
    });

    test('object prototype keys are unknown meshes', () => {
        const registry = createNavMeshRegistry();
        registerNavMesh(registry, createStripNavMesh());
        const agent = createNavAgent('a', [1, 5, 0]);

        const result = setDestination(agent, registry, [29, 5, 0], NavQuery.ACCURACY, NavPathMode.ACCURACY, 'constructor');

        expect(result.success).toBe(false);
        expect(result.flags).toBe(SetDestinationResultFlags.UNKNOWN_MESH);
        expect(agent.state).toBe(NavAgentState.IDLE);
    });

    test('fails when no path exists and drops the previous path', () => {
        const registry = createNavMeshRegistry();
        const stripId = registerNavMesh(registry, createStripNavMesh());
        const islandsId = registerNavMesh(registry, createIslandsNavMesh());
        const agent = createNavAgent('a', [1, 1, 0]);

        expect(setDestination(agent, registry, [29, 5, 0], NavQuery.ACCURACY, NavPathMode.FAST, stripId).success).toBe(true);
        expect(hasPath(agent)).toBe(true);

        const result = setDestination(agent, registry, [101, 1, 0], NavQuery.ACCURACY, NavPathMode.FAST, islandsId);

        expect(result.success).toBe(false);
        expect(result.flags).toBe(SetDestinationResultFlags.PATH_FAILED);
        expect(result.findPathResult?.flags).toBe(FindPathResultFlags.NO_PATH);
        expect(agent.state).toBe(NavAgentState.IDLE);
        expect(agent.destination).toBe(null);
        expect(hasPath(agent)).toBe(false);
        expect(agent.lastDestinationResult).toBe(result);
    });

    test('a successful destination replaces a recorded failure', () => {
        const registry = createNavMeshRegistry();
        const navMeshId = registerNavMesh(registry, createStripNavMesh());
        const agent = createNavAgent('a', [1, 5, 0]);

        setDestination(agent, registry, [29, 5, 0], NavQuery.ACCURACY, NavPathMode.ACCURACY, 'missing');
        expect(hasDestinationFailed(agent)).toBe(true);

        const result = setDestination(agent, registry, [29, 5, 0], NavQuery.ACCURACY, NavPathMode.ACCURACY, navMeshId);

        expect(agent.lastDestinationResult).toBe(result);
        expect(hasDestinationFailed(agent)).toBe(false);
    });
});

describe('clearPath', () => {
    test('returns the agent to idle', () => {
        const registry = createNavMeshRegistry();
        const navMeshId = registerNavMesh(registry, createStripNavMesh());
        const agent = createNavAgent('a', [1, 5, 0]);

        setDestination(agent, registry, [29, 5, 0], NavQuery.CLOSEST, NavPathMode.ACCURACY, navMeshId);
        clearPath(agent);

        expect(agent.state).toBe(NavAgentState.IDLE);
        expect(agent.path).toEqual([]);
        expect(agent.destination).toBe(null);
        expect(agent.navMeshId).toBe(null);
    });
});
