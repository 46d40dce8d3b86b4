/**
 * Integrator conservation report
 *
 * Runs the same scene with each integration strategy and measures how far
 * the conserved quantities wander:
 * - total energy (relative to its initial value, absolute if that is zero)
 * - linear momentum (absolute)
 * - angular momentum about the origin (absolute)
 */

import Vec3 from '../lib/Vector3.js'
import type { BodyData } from '../sim/Body.js'
import { INTEGRATORS, type StrategyName } from '../sim/integrators.js'
import { Simulation } from '../sim/Simulation.js'

export interface DriftScene {
    name: string
    G: number
    bodies: readonly BodyData[]
}

export interface DriftResult {
    scene: string
    strategy: StrategyName
    steps: number
    dt: number
    /** max |E(t) - E0| / |E0| over the run; absolute when E0 is zero */
    energyDrift: number
    /** |P(end) - P0| */
    momentumDrift: number
    /** |Lz(end) - Lz0| */
    angularMomentumDrift: number
    totalMs: number
}

/**
 * Step a fresh simulation of `scene` and collect drift statistics
 */
export function measureDrift(
    scene: DriftScene,
    strategy: StrategyName,
    dt: number,
    steps: number
): DriftResult {
    const sim = new Simulation({ G: scene.G, strategy, bodies: scene.bodies })

    const e0 = sim.totalEnergy()
    const p0 = sim.linearMomentum()
    const l0 = sim.angularMomentum()
    const scale = e0 === 0 ? 1 : Math.abs(e0)
    let energyDrift = 0

    const start = performance.now()
    for (let i = 0; i < steps; i++) {
        sim.step(dt)
        const drift = Math.abs(sim.totalEnergy() - e0) / scale
        if (drift > energyDrift) energyDrift = drift
    }
    const totalMs = performance.now() - start

    return {
        scene: scene.name,
        strategy,
        steps,
        dt,
        energyDrift,
        momentumDrift: Vec3.distance(sim.linearMomentum(), p0),
        angularMomentumDrift: Math.abs(sim.angularMomentum() - l0),
        totalMs
    }
}

/**
 * Run every strategy on the same scene
 */
export function compareIntegrators(scene: DriftScene, dt: number, steps: number): DriftResult[] {
    return INTEGRATORS.map(it => measureDrift(scene, it.name, dt, steps))
}

/**
 * Format drift results as a table
 */
export function formatDriftTable(results: DriftResult[]): string {
    const lines = [
        '┌─────────────────────┬─────────┬─────────────┬─────────────┬─────────────┬─────────────┐',
        '│ Strategy            │   Steps │ Energy      │ Momentum    │ Ang. mom.   │ Total (ms)  │',
        '├─────────────────────┼─────────┼─────────────┼─────────────┼─────────────┼─────────────┤'
    ]

    for (const r of results) {
        const name = r.strategy.padEnd(19)
        const steps = r.steps.toString().padStart(7)
        const energy = r.energyDrift.toExponential(3).padStart(11)
        const momentum = r.momentumDrift.toExponential(3).padStart(11)
        const angular = r.angularMomentumDrift.toExponential(3).padStart(11)
        const total = r.totalMs.toFixed(1).padStart(11)
        lines.push(`│ ${name} │ ${steps} │ ${energy} │ ${momentum} │ ${angular} │ ${total} │`)
    }

    lines.push('└─────────────────────┴─────────┴─────────────┴─────────────┴─────────────┴─────────────┘')
    return lines.join('\n')
}
