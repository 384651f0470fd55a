import type { Vec2, Vec3 } from 'mathcat';
import type { Aabb, PlaneAxes, UpAxis } from '../geometry';

/** A nav mesh vertex. 2D vertices are placed on the z = 0 plane. */
export type NavMeshVertex = Vec3 | Vec2;

/** Three indices into the nav mesh's vertex buffer */
export type NavMeshTriangleIndices = [number, number, number];

/** Sentinel for "no neighbour across this edge" */
export const NULL_TRIANGLE = -1;

export type NavMeshTriangle = {
    /** The indices of the triangle's vertices. Vertices are stored in NavMesh.vertices */
    vertices: NavMeshTriangleIndices;

    /**
     * The neighbour triangle across each edge, or NULL_TRIANGLE for a boundary edge.
     * Edge i runs from vertices[i] to vertices[(i + 1) % 3].
     */
    neis: [number, number, number];

    /** Unit normal, following the triangle's winding */
    normal: Vec3;

    /** The triangle's centroid */
    centroid: Vec3;

    /** The triangle's bounds */
    bounds: Aabb;
};

export type NavMeshBvNode = {
    /** bounds of the bv node */
    bounds: Aabb;
    /** the triangle index for a leaf, or the negated escape offset for an internal node */
    i: number;
};

export type NavMeshBvTree = {
    /** bv nodes, stored depth first */
    nodes: NavMeshBvNode[];
};

/** An edge shared by more than two triangles. Only the first two owners are linked. */
export type NonManifoldEdge = {
    /** the edge's vertex indices, sorted ascending */
    vertices: [number, number];
    /** every triangle owning the edge, in triangle order */
    triangles: number[];
};

/**
 * A navigation mesh over a triangle soup.
 * Built once by `createNavMesh` and never mutated afterwards, so it can be shared freely between agents.
 */
export type NavMesh = {
    /** Vertex positions, flat [x, y, z, x, y, z, ...] */
    vertices: number[];

    /** The mesh triangles, with their derived adjacency */
    triangles: NavMeshTriangle[];

    /** Vertex membership: for each vertex, the triangles touching it */
    vertexTriangles: number[][];

    /** Edges with more than two owners, see NonManifoldEdge */
    nonManifoldEdges: NonManifoldEdge[];

    /** The world axis that points up for this surface */
    upAxis: UpAxis;

    /** The plane axes orthogonal to the up axis, used by all 2D tests */
    planeAxes: PlaneAxes;

    /** Bounds of all vertices used by triangles */
    bounds: Aabb;

    /** Bounding volume tree over the triangles */
    bvTree: NavMeshBvTree;
};

export type NavMeshParams = {
    /**
     * The world axis that points up for the surface (0 = x, 1 = y, 2 = z).
     * @default the axis with the largest area weighted normal component
     */
    upAxis?: UpAxis;

    /**
     * Triangles whose angle sine at the first vertex is below this value are rejected as degenerate.
     * @default 1e-9
     */
    degenerateEpsilon?: number;
};

export const DEFAULT_DEGENERATE_EPSILON = 1e-9;

export enum NavMeshErrorType {
    INVALID_VERTEX = 'invalid-vertex',
    INVALID_TRIANGLE = 'invalid-triangle',
}

export enum InvalidTriangleReason {
    INDEX_OUT_OF_RANGE = 'index-out-of-range',
    DUPLICATE_INDEX = 'duplicate-index',
    DEGENERATE = 'degenerate',
}

export type NavMeshError =
    | {
          type: NavMeshErrorType.INVALID_VERTEX;
          /** the offending vertex */
          vertexIndex: number;
      }
    | {
          type: NavMeshErrorType.INVALID_TRIANGLE;
          /** the offending triangle */
          triangleIndex: number;
          reason: InvalidTriangleReason;
      };

export type CreateNavMeshResult =
    | {
          success: true;
          navMesh: NavMesh;
      }
    | {
          success: false;
          error: NavMeshError;
      };
