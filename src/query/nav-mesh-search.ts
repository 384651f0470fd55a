import type { Vec3 } from 'mathcat';
import { vec3 } from 'mathcat';
import { isFiniteVec3 } from '../geometry';
import { type NavMesh, NULL_TRIANGLE } from './nav-mesh';
import { getEdgeMidPoint, isValidTriangleIndex } from './nav-mesh-api';
import { DEFAULT_QUERY_FILTER, type QueryFilter } from './query-filter';

export const NODE_FLAG_OPEN = 0x01;
export const NODE_FLAG_CLOSED = 0x02;

/** search node state of the start node, which is not entered through an edge */
export const START_NODE_STATE = 3;

export type SearchNode = {
    /** the position of the node, the midpoint of the edge it was entered through */
    position: Vec3;
    /** the cost up to this node */
    cost: number;
    /** the cost up to this node plus the heuristic */
    total: number;
    /** the parent triangle */
    parentTriangle: number | null;
    /** the parent node state */
    parentState: number | null;
    /** node state, the index of the triangle edge the node was entered through */
    state: number;
    /** node flags */
    flags: number;
    /** the triangle for this search node */
    triangle: number;
};

export type SearchNodePool = { [triangle: number]: SearchNode[] };

export type SearchNodeQueue = SearchNode[];

export const getSearchNode = (pool: SearchNodePool, triangle: number, state: number): SearchNode | undefined => {
    const nodes = pool[triangle];
    if (!nodes) return undefined;

    for (let i = 0; i < nodes.length; i++) {
        if (nodes[i].state === state) {
            return nodes[i];
        }
    }

    return undefined;
};

export const addSearchNode = (pool: SearchNodePool, node: SearchNode): void => {
    if (!pool[node.triangle]) {
        pool[node.triangle] = [];
    }
    pool[node.triangle].push(node);
};

export const bubbleUpQueue = (queue: SearchNodeQueue, i: number, node: SearchNode) => {
    // note: (index > 0) means there is a parent
    let parent = Math.floor((i - 1) / 2);

    while (i > 0 && queue[parent].total > node.total) {
        queue[i] = queue[parent];
        i = parent;
        parent = Math.floor((i - 1) / 2);
    }

    queue[i] = node;
};

export const trickleDownQueue = (queue: SearchNodeQueue, i: number, node: SearchNode) => {
    const count = queue.length;
    let child = 2 * i + 1;

    while (child < count) {
        // if there is a right child and it is smaller than the left child
        if (child + 1 < count && queue[child + 1].total < queue[child].total) {
            child++;
        }

        // if the current node is smaller than the smallest child, we are done
        if (node.total <= queue[child].total) {
            break;
        }

        // move the smallest child up
        queue[i] = queue[child];
        i = child;
        child = i * 2 + 1;
    }

    queue[i] = node;
};

export const pushNodeToQueue = (queue: SearchNodeQueue, node: SearchNode): void => {
    queue.push(node);
    bubbleUpQueue(queue, queue.length - 1, node);
};

export const popNodeFromQueue = (queue: SearchNodeQueue): SearchNode | undefined => {
    if (queue.length === 0) {
        return undefined;
    }

    const node = queue[0];
    const lastNode = queue.pop();

    if (queue.length > 0 && lastNode !== undefined) {
        queue[0] = lastNode;
        trickleDownQueue(queue, 0, lastNode);
    }

    return node;
};

export const reindexNodeInQueue = (queue: SearchNodeQueue, node: SearchNode): void => {
    for (let i = 0; i < queue.length; i++) {
        if (queue[i].triangle === node.triangle && queue[i].state === node.state) {
            queue[i] = node;
            bubbleUpQueue(queue, i, node);
            return;
        }
    }
};

const HEURISTIC_SCALE = 0.999; // Search heuristic scale

export enum SlicedFindNodePathStatusFlags {
    NOT_INITIALIZED = 0,
    IN_PROGRESS = 1,
    SUCCESS = 2,
    PARTIAL_RESULT = 4,
    FAILURE = 8,
    INVALID_PARAM = 16,
}

export type SlicedNodePathQuery = {
    status: SlicedFindNodePathStatusFlags;

    // search parameters
    startTriangle: number;
    endTriangle: number;
    startPosition: Vec3;
    endPosition: Vec3;
    filter: QueryFilter;

    // search state
    nodes: SearchNodePool;
    openList: SearchNodeQueue;
    lastBestNode: SearchNode | null;
    lastBestNodeCost: number;
};

/**
 * Creates a new sliced path query object with default values.
 * @returns A new sliced path query ready for initialization
 */
export const createSlicedNodePathQuery = (): SlicedNodePathQuery => ({
    status: SlicedFindNodePathStatusFlags.NOT_INITIALIZED,
    startTriangle: NULL_TRIANGLE,
    endTriangle: NULL_TRIANGLE,
    startPosition: [0, 0, 0],
    endPosition: [0, 0, 0],
    filter: DEFAULT_QUERY_FILTER,
    nodes: {},
    openList: [],
    lastBestNode: null,
    lastBestNodeCost: Infinity,
});

/**
 * Initializes a sliced path query.
 * @param navMesh The navigation mesh
 * @param query The sliced path query to initialize
 * @param startTriangle The starting triangle
 * @param endTriangle The ending triangle
 * @param startPosition The starting position in world space
 * @param endPosition The ending position in world space
 * @param filter The query filter
 * @returns The status of the initialization
 */
export const initSlicedFindNodePath = (
    navMesh: NavMesh,
    query: SlicedNodePathQuery,
    startTriangle: number,
    endTriangle: number,
    startPosition: Vec3,
    endPosition: Vec3,
    filter: QueryFilter = DEFAULT_QUERY_FILTER,
): SlicedFindNodePathStatusFlags => {
    // set search parameters
    query.startTriangle = startTriangle;
    query.endTriangle = endTriangle;
    vec3.copy(query.startPosition, startPosition);
    vec3.copy(query.endPosition, endPosition);
    query.filter = filter;

    // reset search state
    query.status = SlicedFindNodePathStatusFlags.FAILURE;
    query.nodes = {};
    query.openList = [];
    query.lastBestNode = null;
    query.lastBestNodeCost = Infinity;

    // validate input
    if (
        !isValidTriangleIndex(navMesh, startTriangle) ||
        !isValidTriangleIndex(navMesh, endTriangle) ||
        !isFiniteVec3(startPosition) ||
        !isFiniteVec3(endPosition)
    ) {
        query.status = SlicedFindNodePathStatusFlags.FAILURE | SlicedFindNodePathStatusFlags.INVALID_PARAM;
        return query.status;
    }

    // start node
    const startNode: SearchNode = {
        cost: 0,
        total: vec3.distance(startPosition, endPosition) * HEURISTIC_SCALE,
        parentTriangle: null,
        parentState: null,
        triangle: startTriangle,
        state: START_NODE_STATE,
        flags: NODE_FLAG_OPEN,
        position: [startPosition[0], startPosition[1], startPosition[2]],
    };

    addSearchNode(query.nodes, startNode);
    query.lastBestNode = startNode;
    query.lastBestNodeCost = startNode.total;

    // early exit if the start triangle is the end triangle
    if (startTriangle === endTriangle) {
        query.status = SlicedFindNodePathStatusFlags.SUCCESS;
        return query.status;
    }

    pushNodeToQueue(query.openList, startNode);
    query.status = SlicedFindNodePathStatusFlags.IN_PROGRESS;

    return query.status;
};

/**
 * Updates an in-progress sliced path query.
 *
 * @param navMesh The navigation mesh
 * @param query The sliced path query to update
 * @param maxIterations The maximum number of nodes to expand
 * @returns iterations performed
 */
export const updateSlicedFindNodePath = (navMesh: NavMesh, query: SlicedNodePathQuery, maxIterations: number): number => {
    let itersDone = 0;

    // check if query is in valid state
    if (!(query.status & SlicedFindNodePathStatusFlags.IN_PROGRESS)) {
        return itersDone;
    }

    // the mesh may have been swapped out between slices
    if (!isValidTriangleIndex(navMesh, query.startTriangle) || !isValidTriangleIndex(navMesh, query.endTriangle)) {
        query.status = SlicedFindNodePathStatusFlags.FAILURE;
        return itersDone;
    }

    const { filter, endTriangle, endPosition } = query;
    const getCost = filter.getCost;

    while (itersDone < maxIterations) {
        // remove best node from open list and close it
        const bestSearchNode = popNodeFromQueue(query.openList);
        if (!bestSearchNode) break;

        itersDone++;

        bestSearchNode.flags &= ~NODE_FLAG_OPEN;
        bestSearchNode.flags |= NODE_FLAG_CLOSED;

        // check if we've reached the goal
        const bestTriangle = bestSearchNode.triangle;
        if (bestTriangle === endTriangle) {
            query.lastBestNode = bestSearchNode;
            query.status = SlicedFindNodePathStatusFlags.SUCCESS;
            return itersDone;
        }

        // get parent for backtracking prevention
        const parentTriangle = bestSearchNode.parentTriangle ?? undefined;

        // expand to neighbours, in edge order
        for (const neighbourTriangle of navMesh.triangles[bestTriangle].neis) {
            if (neighbourTriangle === NULL_TRIANGLE) {
                continue;
            }

            // skip parent nodes
            if (neighbourTriangle === parentTriangle) {
                continue;
            }

            // apply filter
            if (!filter.passFilter(neighbourTriangle, navMesh)) {
                continue;
            }

            // partition search nodes by the edge they enter the neighbour through
            const state = navMesh.triangles[neighbourTriangle].neis.indexOf(bestTriangle);
            if (state === -1) {
                continue;
            }

            // get or create neighbour node
            let neighbourSearchNode = getSearchNode(query.nodes, neighbourTriangle, state);

            if (!neighbourSearchNode) {
                neighbourSearchNode = {
                    cost: 0,
                    total: 0,
                    parentTriangle: null,
                    parentState: null,
                    triangle: neighbourTriangle,
                    state,
                    flags: 0,
                    position: [0, 0, 0],
                };

                addSearchNode(query.nodes, neighbourSearchNode);

                getEdgeMidPoint(navMesh, bestTriangle, neighbourTriangle, neighbourSearchNode.position);
            }

            // calculate costs
            let cost = 0;
            let heuristic = 0;

            const curCost = getCost(
                bestSearchNode.position,
                neighbourSearchNode.position,
                navMesh,
                parentTriangle,
                bestTriangle,
                neighbourTriangle,
            );
            cost = bestSearchNode.cost + curCost;

            // special case for last node - add cost to reach end position
            if (neighbourTriangle === endTriangle) {
                const endCost = getCost(neighbourSearchNode.position, endPosition, navMesh, bestTriangle, neighbourTriangle, undefined);
                cost = cost + endCost;
                heuristic = 0;
            } else {
                heuristic = vec3.distance(neighbourSearchNode.position, endPosition) * HEURISTIC_SCALE;
            }

            const total = cost + heuristic;

            // skip if worse than existing
            if (
                (neighbourSearchNode.flags & NODE_FLAG_OPEN && total >= neighbourSearchNode.total) ||
                (neighbourSearchNode.flags & NODE_FLAG_CLOSED && total >= neighbourSearchNode.total)
            ) {
                continue;
            }

            // update node
            neighbourSearchNode.parentTriangle = bestTriangle;
            neighbourSearchNode.parentState = bestSearchNode.state;
            neighbourSearchNode.cost = cost;
            neighbourSearchNode.total = total;
            neighbourSearchNode.flags &= ~NODE_FLAG_CLOSED;

            if (neighbourSearchNode.flags & NODE_FLAG_OPEN) {
                reindexNodeInQueue(query.openList, neighbourSearchNode);
            } else {
                neighbourSearchNode.flags |= NODE_FLAG_OPEN;
                pushNodeToQueue(query.openList, neighbourSearchNode);
            }

            // update best node tracking
            if (heuristic < query.lastBestNodeCost) {
                query.lastBestNodeCost = heuristic;
                query.lastBestNode = neighbourSearchNode;
            }
        }
    }

    // check if the search is exhausted
    if (query.openList.length === 0) {
        query.status = SlicedFindNodePathStatusFlags.SUCCESS | SlicedFindNodePathStatusFlags.PARTIAL_RESULT;
    }

    return itersDone;
};

export type FinalizeSlicedFindNodePathResult = {
    status: SlicedFindNodePathStatusFlags;
    /** the triangle corridor from the start triangle */
    path: number[];
};

/**
 * Finalizes and returns the results of a sliced path query.
 * The query is reset and can be initialized again.
 *
 * @param query The sliced path query to finalize
 */
export const finalizeSlicedFindNodePath = (query: SlicedNodePathQuery): FinalizeSlicedFindNodePathResult => {
    const result: FinalizeSlicedFindNodePathResult = {
        status: SlicedFindNodePathStatusFlags.FAILURE,
        path: [],
    };

    if (!query.lastBestNode || query.status & SlicedFindNodePathStatusFlags.FAILURE) {
        result.status = query.status | SlicedFindNodePathStatusFlags.FAILURE;
        query.status = SlicedFindNodePathStatusFlags.NOT_INITIALIZED;
        return result;
    }

    // handle same start/end case
    if (query.startTriangle === query.endTriangle) {
        result.path.push(query.startTriangle);
        result.status = SlicedFindNodePathStatusFlags.SUCCESS;
        query.status = SlicedFindNodePathStatusFlags.NOT_INITIALIZED;
        return result;
    }

    // check for partial result
    if (query.lastBestNode.triangle !== query.endTriangle) {
        query.status |= SlicedFindNodePathStatusFlags.PARTIAL_RESULT;
    }

    // walk the parent chain back to the start
    let currentNode: SearchNode | null = query.lastBestNode;

    while (currentNode) {
        result.path.push(currentNode.triangle);

        if (currentNode.parentTriangle !== null && currentNode.parentState !== null) {
            currentNode = getSearchNode(query.nodes, currentNode.parentTriangle, currentNode.parentState) ?? null;
        } else {
            currentNode = null;
        }
    }

    result.path.reverse();
    result.status = SlicedFindNodePathStatusFlags.SUCCESS | (query.status & SlicedFindNodePathStatusFlags.PARTIAL_RESULT);

    // reset query
    query.status = SlicedFindNodePathStatusFlags.NOT_INITIALIZED;

    return result;
};

export enum FindNodePathResultFlags {
    NONE = 0,
    SUCCESS = 1 << 0,
    COMPLETE_PATH = 1 << 1,
    PARTIAL_PATH = 1 << 2,
    INVALID_INPUT = 1 << 3,
}

export type FindNodePathResult = {
    /** whether the search completed successfully, with either a partial or complete path */
    success: boolean;

    /** the result status flags for the operation */
    flags: FindNodePathResultFlags;

    /** the triangle corridor, from the start triangle */
    path: number[];

    /** intermediate search node pool used for the search */
    nodes: SearchNodePool;

    /** intermediate open list used for the search */
    openList: SearchNodeQueue;
};

/**
 * Find a triangle corridor between two triangles.
 *
 * If the end triangle cannot be reached through the adjacency graph,
 * the last triangle in the path will be the one nearest the end position.
 *
 * The start and end positions are used to calculate traversal costs.
 *
 * @param startTriangle The starting triangle.
 * @param endTriangle The ending triangle.
 * @param startPosition The starting position in world space.
 * @param endPosition The ending position in world space.
 * @param filter The query filter.
 * @returns The result of the pathfinding operation.
 */
export const findNodePath = (
    navMesh: NavMesh,
    startTriangle: number,
    endTriangle: number,
    startPosition: Vec3,
    endPosition: Vec3,
    filter: QueryFilter = DEFAULT_QUERY_FILTER,
): FindNodePathResult => {
    const query = createSlicedNodePathQuery();

    const initStatus = initSlicedFindNodePath(navMesh, query, startTriangle, endTriangle, startPosition, endPosition, filter);

    if (initStatus & SlicedFindNodePathStatusFlags.INVALID_PARAM) {
        return {
            flags: FindNodePathResultFlags.NONE | FindNodePathResultFlags.INVALID_INPUT,
            success: false,
            path: [],
            nodes: query.nodes,
            openList: query.openList,
        };
    }

    // run the search to completion
    updateSlicedFindNodePath(navMesh, query, Infinity);

    const { nodes, openList } = query;
    const { status, path } = finalizeSlicedFindNodePath(query);

    if (status & SlicedFindNodePathStatusFlags.PARTIAL_RESULT) {
        return {
            flags: FindNodePathResultFlags.SUCCESS | FindNodePathResultFlags.PARTIAL_PATH,
            success: true,
            path,
            nodes,
            openList,
        };
    }

    return {
        flags: FindNodePathResultFlags.SUCCESS | FindNodePathResultFlags.COMPLETE_PATH,
        success: true,
        path,
        nodes,
        openList,
    };
};
