import { describe, it, expect, beforeEach, vi } from 'vitest'
import { compareIntegrators, formatDriftTable, measureDrift, type DriftScene } from './Benchmark.js'
import { createPreset } from '../sim/presets.js'

describe('Integrator drift report', () => {
    const scene: DriftScene = {
        name: 'euler',
        G: 0.8,
        bodies: createPreset('euler', 0.8)
    }

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {})
    })

    it('should measure one strategy', () => {
        const result = measureDrift(scene, 'euler', 0.01, 50)

        expect(result.scene).toBe('euler')
        expect(result.strategy).toBe('euler')
        expect(result.steps).toBe(50)
        expect(result.dt).toBe(0.01)
        expect(result.energyDrift).toBeGreaterThan(0)
        expect(result.energyDrift).toBeLessThan(0.02)
        expect(result.momentumDrift).toBeLessThan(1e-12)
        expect(result.totalMs).toBeGreaterThanOrEqual(0)
    })

    it('should report absolute energy drift for a zero-energy scene', () => {
        // Parabolic pair: kinetic 0.25 against potential -0.25
        const parabolic: DriftScene = {
            name: 'parabolic',
            G: 1,
            bodies: [
                { mass: 1, position: [2, 0, 0], velocity: [0, 0.5, 0] },
                { mass: 1, position: [-2, 0, 0], velocity: [0, -0.5, 0] }
            ]
        }

        const result = measureDrift(parabolic, 'euler', 0.01, 10)

        expect(result.energyDrift).toBeGreaterThan(1e-6)
        expect(result.energyDrift).toBeLessThan(1e-4)
    })

    it('should rank semi-implicit Euler above forward Euler on energy', () => {
        const results = compareIntegrators(scene, 0.01, 50)
        const byName = new Map(results.map(r => [r.strategy, r]))

        expect(results.map(r => r.strategy)).toEqual([
            'euler',
            'modified-euler',
            'semi-implicit-euler',
            'runge-kutta'
        ])
        expect(byName.get('semi-implicit-euler')?.energyDrift).toBeLessThan(1e-4)
        expect(byName.get('euler')?.energyDrift).toBeGreaterThan(1e-3)
    })

    it('should format results as a table', () => {
        const table = formatDriftTable([{
            scene: 'euler',
            strategy: 'euler',
            steps: 1000,
            dt: 0.01,
            energyDrift: 0.0123,
            momentumDrift: 0,
            angularMomentumDrift: 1.5e-7,
            totalMs: 12.5
        }])

        expect(table.split('\n')).toEqual([
            '┌─────────────────────┬─────────┬─────────────┬─────────────┬─────────────┬─────────────┐',
            '│ Strategy            │   Steps │ Energy      │ Momentum    │ Ang. mom.   │ Total (ms)  │',
            '├─────────────────────┼─────────┼─────────────┼─────────────┼─────────────┼─────────────┤',
            '│ euler               │    1000 │    1.230e-2 │    0.000e+0 │    1.500e-7 │        12.5 │',
            '└─────────────────────┴─────────┴─────────────┴─────────────┴─────────────┴─────────────┘'
        ])
    })
})
