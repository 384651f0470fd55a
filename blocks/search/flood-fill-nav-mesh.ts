import { type NavMesh, NULL_TRIANGLE } from '../../src';

/**
 * Finds the triangles reachable from the given start triangles over shared edges.
 * Triangles outside `reachable` belong to islands disconnected from every start triangle.
 */
export const floodFillNavMesh = (navMesh: NavMesh, startTriangles: number[]): { reachable: number[]; unreachable: number[] } => {
    const visited = new Set<number>();
    const queue: number[] = [];

    // initialize queue with all seed triangles
    for (const startTriangle of startTriangles) {
        if (startTriangle >= 0 && startTriangle < navMesh.triangles.length) {
            queue.push(startTriangle);
        }
    }

    // bfs from all starting triangles to find all reachable triangles
    for (let head = 0; head < queue.length; head++) {
        const currentTriangle = queue[head];

        if (visited.has(currentTriangle)) continue;

        // add to visited
        visited.add(currentTriangle);

        // follow all shared edges
        for (const nei of navMesh.triangles[currentTriangle].neis) {
            if (nei === NULL_TRIANGLE || visited.has(nei)) continue;
            queue.push(nei);
        }
    }

    // return reached and unreached triangles
    const reachable: number[] = Array.from(visited);
    const unreachable: number[] = [];

    for (let triangleIndex = 0; triangleIndex < navMesh.triangles.length; triangleIndex++) {
        if (!visited.has(triangleIndex)) {
            unreachable.push(triangleIndex);
        }
    }

    return { reachable, unreachable };
};
