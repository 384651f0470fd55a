import type { NavMesh } from '../../src';

/** Opaque handle to a registered nav mesh */
export type NavMeshId = string;

/**
 * Holds the nav meshes agents can path on.
 * Owned by the simulation setup and passed to whatever needs a mesh lookup.
 */
export type NavMeshRegistry = {
    navMeshes: Record<NavMeshId, NavMesh>;
    navMeshIdCounter: number;
};

export const createNavMeshRegistry = (): NavMeshRegistry => ({
    navMeshes: {},
    navMeshIdCounter: 0,
});

/**
 * Registers a nav mesh.
 * @returns the id of the registered mesh, never handed out again for this registry
 */
export const registerNavMesh = (registry: NavMeshRegistry, navMesh: NavMesh): NavMeshId => {
    const navMeshId = String(registry.navMeshIdCounter++);
    registry.navMeshes[navMeshId] = navMesh;
    return navMeshId;
};

export const getNavMesh = (registry: NavMeshRegistry, navMeshId: NavMeshId): NavMesh | undefined => {
    return Object.hasOwn(registry.navMeshes, navMeshId) ? registry.navMeshes[navMeshId] : undefined;
};

/**
 * Removes a nav mesh from the registry.
 * @returns true if the mesh was removed, false if the id is unknown
 */
export const unregisterNavMesh = (registry: NavMeshRegistry, navMeshId: NavMeshId): boolean => {
    if (Object.hasOwn(registry.navMeshes, navMeshId)) {
        delete registry.navMeshes[navMeshId];
        return true;
    }
    return false;
};

/** Ids of all registered meshes, in registration order */
export const getNavMeshIds = (registry: NavMeshRegistry): NavMeshId[] => {
    return Object.keys(registry.navMeshes).sort((a, b) => Number(a) - Number(b));
};
