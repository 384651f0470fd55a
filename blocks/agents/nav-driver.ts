import { vec3 } from 'mathcat';
import { advanceAlongPath, createAdvanceAlongPathResult } from '../../src';
import { type NavAgent, NavAgentState } from './nav-agent';

/**
 * Moves an agent along its path. Agents pick their driver by tag, @see NavAgent.driver
 */
export type NavDriver = {
    /**
     * Consumes elapsed time, moving a FOLLOWING agent along its path.
     * @param agent the agent to move
     * @param deltaTime elapsed time in seconds
     */
    update: (agent: NavAgent, deltaTime: number) => void;
};

const _simpleAdvanceResult = createAdvanceAlongPathResult();
const _simpleToTarget = vec3.create();

/**
 * Looks `max(speed, minTargetDistance) * deltaTime` ahead along the path and moves
 * straight toward that point, by at most `speed * deltaTime`.
 */
export const simpleNavDriver: NavDriver = {
    update: (agent, deltaTime) => {
        if (agent.state !== NavAgentState.FOLLOWING || agent.path.length === 0) return;

        const lookAhead = Math.max(agent.speed, agent.minTargetDistance) * deltaTime;

        const result = advanceAlongPath(_simpleAdvanceResult, agent.path, agent.position, lookAhead, agent.pathProgress);
        if (!result.success) return;

        agent.pathProgress = result.segmentIndex;

        const toTarget = vec3.subtract(_simpleToTarget, result.point, agent.position);
        const distance = vec3.length(toTarget);
        if (distance === 0) return;

        const step = Math.min(agent.speed * deltaTime, distance);
        if (step <= 0) return;

        vec3.scale(agent.direction, toTarget, 1 / distance);

        if (step === distance) {
            vec3.copy(agent.position, result.point);
        } else {
            vec3.scaleAndAdd(agent.position, agent.position, agent.direction, step);
        }
    },
};

export const DEFAULT_NAV_DRIVERS: Record<string, NavDriver> = {
    simple: simpleNavDriver,
};
