import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import type { NavMesh } from './nav-mesh';

export type QueryFilter = {
    /**
     * Checks if a nav mesh triangle passes the filter.
     * @param triangleIndex The triangle index.
     * @param navMesh The navmesh
     * @returns Whether the triangle passes the filter.
     */
    passFilter: (triangleIndex: number, navMesh: NavMesh) => boolean;

    /**
     * Calculates the cost of moving from one point to another.
     * @param pa The start position on the edge of the previous and current triangle.
     * @param pb The end position on the edge of the current and next triangle.
     * @param navMesh The navigation mesh
     * @param prevTriangle The previous triangle. [opt]
     * @param curTriangle The current triangle.
     * @param nextTriangle The next triangle. [opt]
     * @returns The cost of moving from the start to the end position.
     */
    getCost: (
        pa: Vec3,
        pb: Vec3,
        navMesh: NavMesh,
        prevTriangle: number | undefined,
        curTriangle: number,
        nextTriangle: number | undefined,
    ) => number;
};

/** Every triangle passes, costs are euclidean distances */
export const DEFAULT_QUERY_FILTER = {
    passFilter: () => true,
    getCost: (pa, pb) => vec3.distance(pa, pb),
} satisfies QueryFilter;
