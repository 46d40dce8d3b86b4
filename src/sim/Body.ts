import Vec3, { type IVec3, type Vec3Tuple } from '../lib/Vector3.js'
import { InvalidBodyError } from './errors.js'

export type VectorInput = IVec3 | Vec3Tuple

/**
 * Position and velocity of one body, advanced together by every integrator.
 * The same shape carries the time derivative (velocity, acceleration).
 */
export interface BodyState {
    pos: Vec3
    vel: Vec3
}

export interface Body extends BodyState {
    mass: number
}

/** Plain read-back form of a body, detached from simulation state */
export interface BodyData {
    mass: number
    position: [number, number, number]
    velocity: [number, number, number]
}

export function createBody(mass: number, position: VectorInput, velocity: VectorInput): Body {
    if (!Number.isFinite(mass) || mass <= 0) {
        throw new InvalidBodyError(`mass must be finite and positive, got ${mass}`)
    }
    const pos = Vec3.from(position)
    const vel = Vec3.from(velocity)
    if (!pos.isFinite()) {
        throw new InvalidBodyError(`position ${pos} is not finite`)
    }
    if (!vel.isFinite()) {
        throw new InvalidBodyError(`velocity ${vel} is not finite`)
    }
    return { mass, pos, vel }
}

export function copyState(s: BodyState): BodyState {
    return { pos: s.pos.copy(), vel: s.vel.copy() }
}

/** s + d * h, as a new state */
export function advanceState(s: BodyState, d: BodyState, h: number): BodyState {
    return {
        pos: s.pos.copy().addScaled(d.pos, h),
        vel: s.vel.copy().addScaled(d.vel, h)
    }
}

export function toBodyData(body: Body): BodyData {
    return {
        mass: body.mass,
        position: body.pos.toArray(),
        velocity: body.vel.toArray()
    }
}
