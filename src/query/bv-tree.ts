import type { Vec3 } from 'mathcat';
import { type Aabb, distancePtAabbSqr, overlapAabb } from '../geometry';
import type { NavMeshBvNode, NavMeshBvTree, NavMeshTriangle } from './nav-mesh';

const compareItemX = (a: NavMeshBvNode, b: NavMeshBvNode): number => a.bounds[0][0] - b.bounds[0][0] || a.i - b.i;

const compareItemY = (a: NavMeshBvNode, b: NavMeshBvNode): number => a.bounds[0][1] - b.bounds[0][1] || a.i - b.i;

const compareItemZ = (a: NavMeshBvNode, b: NavMeshBvNode): number => a.bounds[0][2] - b.bounds[0][2] || a.i - b.i;

const COMPARE_ITEM = [compareItemX, compareItemY, compareItemZ];

const calcExtends = (items: NavMeshBvNode[], imin: number, imax: number): Aabb => {
    const bounds: Aabb = [
        [items[imin].bounds[0][0], items[imin].bounds[0][1], items[imin].bounds[0][2]],
        [items[imin].bounds[1][0], items[imin].bounds[1][1], items[imin].bounds[1][2]],
    ];

    for (let i = imin + 1; i < imax; ++i) {
        const it = items[i];
        if (it.bounds[0][0] < bounds[0][0]) bounds[0][0] = it.bounds[0][0];
        if (it.bounds[0][1] < bounds[0][1]) bounds[0][1] = it.bounds[0][1];
        if (it.bounds[0][2] < bounds[0][2]) bounds[0][2] = it.bounds[0][2];

        if (it.bounds[1][0] > bounds[1][0]) bounds[1][0] = it.bounds[1][0];
        if (it.bounds[1][1] > bounds[1][1]) bounds[1][1] = it.bounds[1][1];
        if (it.bounds[1][2] > bounds[1][2]) bounds[1][2] = it.bounds[1][2];
    }

    return bounds;
};

const longestAxis = (x: number, y: number, z: number): number => {
    let axis = 0;
    let maxVal = x;
    if (y > maxVal) {
        axis = 1;
        maxVal = y;
    }
    if (z > maxVal) {
        axis = 2;
    }
    return axis;
};

const subdivide = (items: NavMeshBvNode[], imin: number, imax: number, nodes: NavMeshBvNode[]): void => {
    const inum = imax - imin;
    const icur = nodes.length;

    if (inum === 1) {
        // leaf
        const item = items[imin];
        nodes.push({
            bounds: [
                [item.bounds[0][0], item.bounds[0][1], item.bounds[0][2]],
                [item.bounds[1][0], item.bounds[1][1], item.bounds[1][2]],
            ],
            i: item.i,
        });
        return;
    }

    // split
    const node: NavMeshBvNode = {
        bounds: calcExtends(items, imin, imax),
        i: 0,
    };
    nodes.push(node);

    const axis = longestAxis(
        node.bounds[1][0] - node.bounds[0][0],
        node.bounds[1][1] - node.bounds[0][1],
        node.bounds[1][2] - node.bounds[0][2],
    );

    // sort along the longest axis
    const segment = items.slice(imin, imax);
    segment.sort(COMPARE_ITEM[axis]);
    for (let i = 0; i < segment.length; i++) {
        items[imin + i] = segment[i];
    }

    const isplit = imin + Math.floor(inum / 2);

    // left
    subdivide(items, imin, isplit, nodes);
    // right
    subdivide(items, isplit, imax, nodes);

    // negative index means escape
    node.i = -(nodes.length - icur);
};

/**
 * Builds a bounding volume tree over the given triangles.
 * Nodes are stored depth first; an internal node's negated `i` is the offset to the next node outside its subtree.
 */
export const buildNavMeshBvTree = (triangles: NavMeshTriangle[]): NavMeshBvTree => {
    if (triangles.length === 0) {
        return { nodes: [] };
    }

    const items: NavMeshBvNode[] = triangles.map((triangle, i) => ({
        bounds: triangle.bounds,
        i,
    }));

    const nodes: NavMeshBvNode[] = [];
    subdivide(items, 0, items.length, nodes);

    return { nodes };
};

/**
 * Collects the indices of all triangles whose bounds overlap the query bounds.
 */
export const queryBvTree = (out: number[], bvTree: NavMeshBvTree, bounds: Aabb): number[] => {
    const nodes = bvTree.nodes;
    let nodeIndex = 0;

    while (nodeIndex < nodes.length) {
        const bvNode = nodes[nodeIndex];
        const overlap = overlapAabb(bvNode.bounds, bounds);
        const isLeafNode = bvNode.i >= 0;

        if (isLeafNode && overlap) {
            out.push(bvNode.i);
        }

        if (overlap || isLeafNode) {
            nodeIndex++;
        } else {
            nodeIndex += -bvNode.i;
        }
    }

    return out;
};

/**
 * Visits the leaves of the tree that may hold a triangle closer to the point than the current best.
 *
 * @param visit called per candidate triangle, returns the candidate's squared distance (or Infinity to reject it)
 * @returns the best squared distance found
 */
export const nearestBvTree = (bvTree: NavMeshBvTree, point: Vec3, visit: (triangleIndex: number) => number): number => {
    const nodes = bvTree.nodes;
    let bestDistSqr = Infinity;
    let nodeIndex = 0;

    while (nodeIndex < nodes.length) {
        const bvNode = nodes[nodeIndex];
        const isLeafNode = bvNode.i >= 0;

        // equal distances are kept so ties can be resolved by the visitor
        const reachable = distancePtAabbSqr(point, bvNode.bounds) <= bestDistSqr;

        if (isLeafNode && reachable) {
            const distSqr = visit(bvNode.i);
            if (distSqr < bestDistSqr) {
                bestDistSqr = distSqr;
            }
        }

        if (reachable || isLeafNode) {
            nodeIndex++;
        } else {
            nodeIndex += -bvNode.i;
        }
    }

    return bestDistSqr;
};
