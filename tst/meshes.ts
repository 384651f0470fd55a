import { createNavMesh, type NavMesh, type NavMeshParams, type NavMeshTriangleIndices, type NavMeshVertex } from '../src';

export const build = (vertices: NavMeshVertex[], triangles: NavMeshTriangleIndices[], params?: NavMeshParams): NavMesh => {
    const result = createNavMesh(vertices, triangles, params);
    if (!result.success) {
        throw new Error(`failed to create nav mesh: ${JSON.stringify(result.error)}`);
    }
    return result.navMesh;
};

/**
 * A C shaped mesh in the xy plane wrapped around a rectangular hole:
 * a thin ledge along the bottom, a wall on the left, a wide band along the top and a column on the right.
 */
export const C_SHAPE_VERTICES: NavMeshVertex[] = [
    [50, 50], // 0
    [500, 50], // 1
    [500, 100], // 2
    [100, 100], // 3
    [100, 300], // 4
    [700, 300], // 5
    [700, 50], // 6
    [750, 50], // 7
    [750, 550], // 8
    [50, 550], // 9
];

export const C_SHAPE_TRIANGLES: NavMeshTriangleIndices[] = [
    [1, 2, 3], // 0
    [0, 1, 3], // 1
    [0, 3, 4], // 2
    [0, 4, 9], // 3
    [4, 8, 9], // 4
    [4, 5, 8], // 5
    [5, 7, 8], // 6
    [5, 6, 7], // 7
];

export const createCShapeNavMesh = (): NavMesh => build(C_SHAPE_VERTICES, C_SHAPE_TRIANGLES);

/**
 * A 30 x 10 strip in the xy plane, three squares each split along its rising diagonal.
 */
export const createStripNavMesh = (): NavMesh =>
    build(
        [
            [0, 0, 0],
            [10, 0, 0],
            [20, 0, 0],
            [30, 0, 0],
            [0, 10, 0],
            [10, 10, 0],
            [20, 10, 0],
            [30, 10, 0],
        ],
        [
            [0, 1, 5],
            [0, 5, 4],
            [1, 2, 6],
            [1, 6, 5],
            [2, 3, 7],
            [2, 7, 6],
        ],
    );

/** Two triangles sharing no edge */
export const createIslandsNavMesh = (): NavMesh =>
    build(
        [
            [0, 0, 0],
            [10, 0, 0],
            [0, 10, 0],
            [100, 0, 0],
            [110, 0, 0],
            [100, 10, 0],
        ],
        [
            [0, 1, 2],
            [3, 4, 5],
        ],
    );
