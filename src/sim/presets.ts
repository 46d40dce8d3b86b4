import type { BodyData } from './Body.js'
import { UnknownPresetError } from './errors.js'
import type { Simulation } from './Simulation.js'

export type PresetName = 'default' | 'euler' | 'lagrange' | 'figure-8'

export const PRESET_NAMES: readonly PresetName[] = ['default', 'euler', 'lagrange', 'figure-8']

/**
 * Periodic three-body solutions with unit masses.
 *
 * euler:    collinear, outer bodies at distance r from a body at rest,
 *           v² = (5/4)·G/r
 * lagrange: equilateral triangle of circumradius r, v² = G/(√3·r)
 * figure-8: Chenciner–Montgomery orbit (initial values for G = 1),
 *           velocities scaled by √G
 * default:  the start-up scene; with G = 0.8 it is the euler solution
 */
export function createPreset(name: string, G: number, r = 1): BodyData[] {
    switch (name) {
        case 'default':
            return [
                { mass: 1, position: [0, 0, 0], velocity: [0, 0, 0] },
                { mass: 1, position: [1, 0, 0], velocity: [0, 1, 0] },
                { mass: 1, position: [-1, 0, 0], velocity: [0, -1, 0] }
            ]

        case 'euler': {
            const v = Math.sqrt(1.25 * G / r)
            return [
                { mass: 1, position: [0, 0, 0], velocity: [0, 0, 0] },
                { mass: 1, position: [r, 0, 0], velocity: [0, v, 0] },
                { mass: 1, position: [-r, 0, 0], velocity: [0, -v, 0] }
            ]
        }

        case 'lagrange': {
            const v = Math.sqrt(G / (Math.sqrt(3) * r))
            const bodies: BodyData[] = []
            for (let k = 0; k < 3; k++) {
                const theta = k * 2 * Math.PI / 3
                const c = Math.cos(theta)
                const s = Math.sin(theta)
                bodies.push({ mass: 1, position: [r * c, r * s, 0], velocity: [-v * s, v * c, 0] })
            }
            return bodies
        }

        case 'figure-8': {
            const k = Math.sqrt(G)
            const x = 0.97000436
            const y = -0.24308753
            const vx = 0.93240737
            const vy = 0.86473146
            return [
                { mass: 1, position: [x, y, 0], velocity: [k * vx / 2, k * vy / 2, 0] },
                { mass: 1, position: [-x, -y, 0], velocity: [k * vx / 2, k * vy / 2, 0] },
                { mass: 1, position: [0, 0, 0], velocity: [-k * vx, -k * vy, 0] }
            ]
        }

        default:
            throw new UnknownPresetError(name)
    }
}

/** Replace the simulation's bodies with a preset scaled to its current G */
export function loadPreset(sim: Simulation, name: string, r = 1): void {
    const bodies = createPreset(name, sim.G, r)
    sim.clear()
    for (const body of bodies) {
        sim.addBody(body.mass, body.position, body.velocity)
    }
}
