import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { Simulation } from './Simulation.js'
import { SimulationDriver } from './SimulationDriver.js'
import { createPreset } from './presets.js'
import { AppLog } from '../AppLog.js'

describe('SimulationDriver', () => {
    let sim: Simulation
    let driver: SimulationDriver

    beforeEach(() => {
        vi.spyOn(console, 'log').mockImplementation(() => {})
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        vi.spyOn(console, 'error').mockImplementation(() => {})
        sim = new Simulation({ G: 0.8, bodies: createPreset('default', 0.8) })
        driver = new SimulationDriver(sim)
    })

    afterEach(() => {
        driver.stop()
        vi.useRealTimers()
    })

    describe('tick', () => {
        it('should step by the frame delta', () => {
            expect(driver.tick(0.01)).toBe(0.01)
            expect(sim.time).toBe(0.01)
        })

        it('should clamp long frames to maxStep', () => {
            expect(driver.maxStep).toBe(0.03)
            expect(driver.tick(0.5)).toBe(0.03)
            expect(sim.time).toBe(0.03)
        })

        it('should honour a custom maxStep', () => {
            const d = new SimulationDriver(sim, { maxStep: 0.005 })
            expect(d.tick(0.01)).toBe(0.005)
        })

        it('should scale the frame delta by timeFactor before clamping', () => {
            driver.timeFactor = 2
            expect(driver.tick(0.01)).toBe(0.02)
            expect(driver.tick(0.02)).toBe(0.03)
        })

        it('should not step while paused', () => {
            sim.setRunning(false)
            const before = sim.getBodies()

            expect(driver.tick(0.01)).toBe(0)
            expect(sim.time).toBe(0)
            expect(sim.getBodies()).toEqual(before)
        })

        it('should skip empty frames', () => {
            expect(driver.tick(0)).toBe(0)
            expect(sim.time).toBe(0)
        })

        it('should report each step to onTick', () => {
            const onTick = vi.fn()
            driver.onTick = onTick

            driver.tick(0.02)
            expect(onTick).toHaveBeenCalledWith(0.02)
        })

        it('should step with the simulation strategy', () => {
            sim.setStrategy('Euler')
            driver.tick(0.01)

            expect(sim.getBody(1).position).toEqual([1, 0.01, 0])
        })
    })

    describe('start/stop', () => {
        beforeEach(() => {
            vi.useFakeTimers({ toFake: ['setInterval', 'clearInterval', 'Date'] })
        })

        it('should tick at the configured rate', () => {
            const d = new SimulationDriver(sim, { tickRate: 100 })
            const onTick = vi.fn()
            d.onTick = onTick

            d.start()
            expect(d.isStarted).toBe(true)
            vi.advanceTimersByTime(50)
            d.stop()

            expect(onTick).toHaveBeenCalledTimes(5)
            expect(onTick).toHaveBeenLastCalledWith(0.01)
            expect(sim.time).toBeCloseTo(0.05, 12)
        })

        it('should stop ticking after stop()', () => {
            driver.start()
            vi.advanceTimersByTime(40)
            driver.stop()
            const time = sim.time

            vi.advanceTimersByTime(100)
            expect(driver.isStarted).toBe(false)
            expect(sim.time).toBe(time)
        })

        it('should ignore a second start()', () => {
            const onTick = vi.fn()
            driver.onTick = onTick

            driver.start()
            driver.start()
            vi.advanceTimersByTime(80)

            // 120 Hz rounds to an 8 ms interval
            expect(onTick).toHaveBeenCalledTimes(10)
        })

        it('should pause the simulation when a step fails', () => {
            sim.clear()
            sim.addBody(1, [0, 0, 0], [0, 0, 0])
            sim.addBody(1, [0, 0, 0], [0, 0, 0])

            driver.start()
            vi.advanceTimersByTime(8)

            expect(sim.isRunning()).toBe(false)
            expect(sim.time).toBe(0)
            const entries = AppLog.getEntries()
            expect(entries[entries.length - 1]).toMatchObject({
                level: 'error',
                message: 'Simulation paused: Bodies 0 and 1 are coincident'
            })
        })
    })
})
