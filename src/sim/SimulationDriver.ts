import { AppLog } from '../AppLog.js'
import type { Simulation } from './Simulation.js'
import { SimulationConfig } from './SimulationConfig.js'

export interface DriverOptions {
    /** Largest dt passed to step() */
    maxStep?: number
    /** Ticks per second when started with start() */
    tickRate?: number
    timeFactor?: number
}

/**
 * Frame loop around a Simulation.
 *
 * tick() takes the wall-clock frame delta, scales it by timeFactor, clamps it
 * to maxStep and steps the simulation while it is running. start() drives
 * tick() from a fixed-interval timer.
 */
export class SimulationDriver {
    readonly maxStep: number
    timeFactor: number

    private interval: number
    private timer: ReturnType<typeof setInterval> | null = null
    private lastTick = 0

    /** Called after every tick that stepped the simulation */
    onTick?: (dt: number) => void

    constructor(
        readonly simulation: Simulation,
        options: DriverOptions = {}
    ) {
        this.maxStep = options.maxStep ?? SimulationConfig.maxStep
        this.timeFactor = options.timeFactor ?? 1.0
        this.interval = Math.round(1000 / (options.tickRate ?? SimulationConfig.tickRate))
    }

    get isStarted(): boolean {
        return this.timer !== null
    }

    /**
     * Advance by one frame. Returns the dt actually stepped, 0 when paused or
     * when the frame delta is not positive.
     */
    tick(frameSeconds: number): number {
        if (!this.simulation.isRunning()) return 0

        const dt = Math.min(frameSeconds * this.timeFactor, this.maxStep)
        if (!(dt > 0)) return 0

        this.simulation.step(dt)
        this.onTick?.(dt)
        return dt
    }

    start(): void {
        if (this.timer !== null) return
        this.lastTick = Date.now()
        this.timer = setInterval(() => this.tickFromClock(), this.interval)
        AppLog.info('Simulation started')
    }

    stop(): void {
        if (this.timer !== null) {
            clearInterval(this.timer)
            this.timer = null
            AppLog.info('Simulation stopped')
        }
    }

    private tickFromClock(): void {
        const now = Date.now()
        const frameSeconds = (now - this.lastTick) / 1000
        this.lastTick = now
        try {
            this.tick(frameSeconds)
        } catch (err) {
            // Pause on a failed step; the bodies keep their last committed state
            this.simulation.setRunning(false)
            AppLog.error(`Simulation paused: ${err instanceof Error ? err.message : String(err)}`)
        }
    }
}
