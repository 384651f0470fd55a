import { describe, expect, test } from 'vitest';
import {
    createSlicedNodePathQuery,
    DEFAULT_QUERY_FILTER,
    FindNodePathResultFlags,
    finalizeSlicedFindNodePath,
    findNodePath,
    initSlicedFindNodePath,
    type QueryFilter,
    SlicedFindNodePathStatusFlags,
    updateSlicedFindNodePath,
} from '../src';
import { createCShapeNavMesh, createIslandsNavMesh, createStripNavMesh } from './meshes';

describe('findNodePath', () => {
    test('finds the corridor around a C shaped mesh', () => {
        const navMesh = createCShapeNavMesh();

        const result = findNodePath(navMesh, 1, 5, [60, 60, 0], [700, 500, 0]);

        expect(result.success).toBe(true);
        expect(result.flags).toBe(FindNodePathResultFlags.SUCCESS | FindNodePathResultFlags.COMPLETE_PATH);
        expect(result.path).toEqual([1, 2, 3, 4, 5]);
    });

    test('a start triangle equal to the end triangle is a one triangle corridor', () => {
        const navMesh = createCShapeNavMesh();

        const result = findNodePath(navMesh, 4, 4, [400, 450, 0], [410, 450, 0]);

        expect(result.path).toEqual([4]);
        expect(result.flags).toBe(FindNodePathResultFlags.SUCCESS | FindNodePathResultFlags.COMPLETE_PATH);
    });

    test('returns a partial corridor when the end is unreachable', () => {
        const navMesh = createIslandsNavMesh();

        const result = findNodePath(navMesh, 0, 1, [1, 1, 0], [101, 1, 0]);

        expect(result.success).toBe(true);
        expect(result.flags).toBe(FindNodePathResultFlags.SUCCESS | FindNodePathResultFlags.PARTIAL_PATH);
        expect(result.path).toEqual([0]);
    });

    test('rejects invalid triangles', () => {
        const navMesh = createCShapeNavMesh();

        const result = findNodePath(navMesh, 0, 42, [300, 90, 0], [0, 0, 0]);

        expect(result.success).toBe(false);
        expect(result.flags).toBe(FindNodePathResultFlags.INVALID_INPUT);
    });

    test('never enters triangles rejected by the filter', () => {
        const navMesh = createStripNavMesh();
        const filter: QueryFilter = {
            ...DEFAULT_QUERY_FILTER,
            passFilter: (triangleIndex) => triangleIndex !== 2,
        };

        const result = findNodePath(navMesh, 1, 4, [1, 5, 0], [29, 5, 0], filter);

        expect(result.flags & FindNodePathResultFlags.PARTIAL_PATH).toBeTruthy();
        expect(result.path).not.toContain(2);
    });
});

describe('sliced findNodePath', () => {
    test('running one iteration at a time gives the same corridor as a single call', () => {
        const navMesh = createCShapeNavMesh();
        const query = createSlicedNodePathQuery();

        const status = initSlicedFindNodePath(navMesh, query, 1, 5, [60, 60, 0], [700, 500, 0]);
        expect(status).toBe(SlicedFindNodePathStatusFlags.IN_PROGRESS);

        let slices = 0;
        while (query.status & SlicedFindNodePathStatusFlags.IN_PROGRESS) {
            expect(updateSlicedFindNodePath(navMesh, query, 1)).toBeLessThanOrEqual(1);
            slices++;
        }

        expect(slices).toBeGreaterThan(1);
        expect(query.status).toBe(SlicedFindNodePathStatusFlags.SUCCESS);

        const result = finalizeSlicedFindNodePath(query);

        expect(result.status).toBe(SlicedFindNodePathStatusFlags.SUCCESS);
        expect(result.path).toEqual(findNodePath(navMesh, 1, 5, [60, 60, 0], [700, 500, 0]).path);
        expect(query.status).toBe(SlicedFindNodePathStatusFlags.NOT_INITIALIZED);
    });

    test('init fails for an invalid triangle', () => {
        const navMesh = createCShapeNavMesh();
        const query = createSlicedNodePathQuery();

        const status = initSlicedFindNodePath(navMesh, query, -1, 5, [60, 60, 0], [700, 500, 0]);

        expect(status).toBe(SlicedFindNodePathStatusFlags.FAILURE | SlicedFindNodePathStatusFlags.INVALID_PARAM);
        expect(updateSlicedFindNodePath(navMesh, query, 10)).toBe(0);
        expect(finalizeSlicedFindNodePath(query).status & SlicedFindNodePathStatusFlags.FAILURE).toBeTruthy();
    });
});
