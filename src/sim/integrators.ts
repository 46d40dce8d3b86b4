import Vec3 from '../lib/Vector3.js'
import { advanceState, type BodyState } from './Body.js'
import { UnsupportedStrategyError } from './errors.js'

export type StrategyName = 'euler' | 'modified-euler' | 'semi-implicit-euler' | 'runge-kutta'

/**
 * Read-only view of the system an integrator advances.
 * derivative() evaluates the ODE right-hand side (velocity, acceleration) of
 * body i at a candidate state; the other bodies stay where they are stored.
 */
export interface DerivativeSource {
    readonly count: number
    getState(i: number): BodyState
    derivative(i: number, state?: BodyState): BodyState
}

/**
 * Time-stepping strategy.
 *
 * integrate() returns the next state of every body and must not write to the
 * source: every derivative is taken from the same snapshot and the caller
 * commits the whole array at once.
 */
export interface Integrator {
    /** Unique name used for selection */
    name: StrategyName

    /** Display label used by the driver's strategy menu */
    label: string

    integrate(source: DerivativeSource, dt: number): BodyState[]
}

/**
 * Create an integrator that advances each body independently from the
 * snapshot held by the source.
 */
export function createIntegrator(config: {
    name: StrategyName
    label: string
    advance: (source: DerivativeSource, i: number, dt: number) => BodyState
}): Integrator {
    const { name, label, advance } = config
    return {
        name,
        label,
        integrate(source: DerivativeSource, dt: number): BodyState[] {
            const next: BodyState[] = new Array(source.count)
            for (let i = 0; i < source.count; i++) {
                next[i] = advance(source, i, dt)
            }
            return next
        }
    }
}

/** Forward Euler: y += dt * f(y) */
export const Euler = createIntegrator({
    name: 'euler',
    label: 'Euler',
    advance(source, i, dt) {
        return advanceState(source.getState(i), source.derivative(i), dt)
    }
})

/**
 * Semi-implicit Euler with single-precision state.
 *
 * The position also receives dt² * a from the same acceleration sample, which
 * is what using the updated velocity for the position step amounts to. The
 * result is rounded through float32 before it is stored; long runs depend on
 * that rounding, so it must stay.
 */
export const SemiImplicitEuler = createIntegrator({
    name: 'semi-implicit-euler',
    label: 'SI Euler',
    advance(source, i, dt) {
        const d = source.derivative(i)
        const next = advanceState(source.getState(i), d, dt)
        next.pos.addScaled(Vec3.scale(d.vel, dt), dt)
        next.pos.fround()
        next.vel.fround()
        return next
    }
})

/** Heun's method: y += dt/2 * (k1 + k2) */
export const ModifiedEuler = createIntegrator({
    name: 'modified-euler',
    label: 'Mod. Euler',
    advance(source, i, dt) {
        const y0 = source.getState(i)
        const k1 = source.derivative(i, y0)
        const k2 = source.derivative(i, advanceState(y0, k1, dt))
        const sum: BodyState = {
            pos: Vec3.add(k1.pos, k2.pos),
            vel: Vec3.add(k1.vel, k2.vel)
        }
        return advanceState(y0, sum, dt / 2)
    }
})

/** Classical four-stage Runge-Kutta */
export const RungeKutta = createIntegrator({
    name: 'runge-kutta',
    label: 'Runge-Kutta',
    advance(source, i, dt) {
        const y0 = source.getState(i)
        const k1 = source.derivative(i, y0)
        const k2 = source.derivative(i, advanceState(y0, k1, dt / 2))
        const k3 = source.derivative(i, advanceState(y0, k2, dt / 2))
        const k4 = source.derivative(i, advanceState(y0, k3, dt))
        const sum: BodyState = {
            pos: k1.pos.copy().addScaled(k2.pos, 2).addScaled(k3.pos, 2).add(k4.pos),
            vel: k1.vel.copy().addScaled(k2.vel, 2).addScaled(k3.vel, 2).add(k4.vel)
        }
        return advanceState(y0, sum, dt / 6)
    }
})

export const INTEGRATORS: readonly Integrator[] = [Euler, ModifiedEuler, SemiImplicitEuler, RungeKutta]

/**
 * Resolve a strategy by name or menu label ("Euler", "Mod. Euler",
 * "SI Euler", "Runge-Kutta"). Matching ignores case and surrounding space.
 */
export function parseStrategy(nameOrLabel: string): Integrator {
    const key = nameOrLabel.trim().toLowerCase()
    const integrator = INTEGRATORS.find(
        it => it.name === key || it.label.toLowerCase() === key
    )
    if (!integrator) {
        throw new UnsupportedStrategyError(nameOrLabel)
    }
    return integrator
}
