import Vec3 from '../lib/Vector3.js'
import { AppLog } from '../AppLog.js'
import {
    copyState,
    createBody,
    toBodyData,
    type Body,
    type BodyData,
    type BodyState,
    type VectorInput
} from './Body.js'
import {
    EmptySystemError,
    InvalidTimeStepError,
    NonFiniteStateError,
    OutOfRangeError,
    SimulationError,
    SingularConfigurationError
} from './errors.js'
import {
    Euler,
    ModifiedEuler,
    RungeKutta,
    SemiImplicitEuler,
    parseStrategy,
    type DerivativeSource,
    type Integrator,
    type StrategyName
} from './integrators.js'
import { SimulationConfig } from './SimulationConfig.js'

/**
 * Event types for the body list and time evolution
 */
export type SimulationEvent = 'bodyAdded' | 'bodySet' | 'bodyRemoved' | 'cleared' | 'stepped'

export interface SimulationEventData {
    bodyAdded: { index: number }
    bodySet: { index: number }
    /** Indices above `index` have shifted down by one */
    bodyRemoved: { index: number }
    cleared: { count: number }
    stepped: { time: number; dt: number }
}

type EventCallback<T extends SimulationEvent> = (data: SimulationEventData[T]) => void

type ListenerSets = { [T in SimulationEvent]: Set<EventCallback<T>> }

export interface SimulationOptions {
    G?: number
    /** Strategy name or menu label */
    strategy?: StrategyName | string
    running?: boolean
    bodies?: readonly BodyData[]
}

/** Reference position and velocity for angular momentum */
export interface ReferenceFrame {
    position?: VectorInput
    velocity?: VectorInput
}

export interface AxisPositions {
    x: number[]
    y: number[]
    z: number[]
}

/**
 * Gravitational N-body system.
 *
 * Owns the ordered body list (index is identity), the simulation clock and
 * the selected integration strategy. Every mutator either applies completely
 * or throws with the state untouched; steps are computed from a snapshot and
 * committed in one go.
 */
export class Simulation implements DerivativeSource {
    private bodies: Body[]
    private _time = 0
    private _G: number
    private running: boolean
    private integrator: Integrator

    private listeners: ListenerSets = {
        bodyAdded: new Set(),
        bodySet: new Set(),
        bodyRemoved: new Set(),
        cleared: new Set(),
        stepped: new Set()
    }

    constructor(options: SimulationOptions = {}) {
        this._G = validateG(options.G ?? SimulationConfig.G)
        this.integrator = parseStrategy(options.strategy ?? SimulationConfig.strategy)
        this.running = options.running ?? true
        this.bodies = (options.bodies ?? []).map(b => createBody(b.mass, b.position, b.velocity))
    }

    // ==================== Parameters ====================

    get G(): number {
        return this._G
    }

    setGravitationalConstant(g: number): void {
        this._G = validateG(g)
        AppLog.info(`G = ${g.toFixed(2)}`)
    }

    get time(): number {
        return this._time
    }

    get count(): number {
        return this.bodies.length
    }

    get strategy(): StrategyName {
        return this.integrator.name
    }

    /** Select the strategy used by step(); accepts names and menu labels */
    setStrategy(nameOrLabel: string): void {
        const integrator = parseStrategy(nameOrLabel)
        if (integrator !== this.integrator) {
            this.integrator = integrator
            AppLog.info(`Integrator: ${integrator.label}`)
        }
    }

    // ==================== Running Flag ====================

    isRunning(): boolean {
        return this.running
    }

    setRunning(running: boolean): void {
        this.running = running
    }

    toggleRunning(): boolean {
        this.running = !this.running
        return this.running
    }

    // ==================== Body Management ====================

    addBody(mass: number, position: VectorInput, velocity: VectorInput): number {
        const body = createBody(mass, position, velocity)
        const index = this.bodies.push(body) - 1
        AppLog.info(`Added body ${index}: m ${mass}, r ${body.pos}, v ${body.vel}`)
        this.emit('bodyAdded', { index })
        return index
    }

    setBody(index: number, mass: number, position: VectorInput, velocity: VectorInput): void {
        this.checkIndex(index)
        const body = createBody(mass, position, velocity)
        this.bodies[index] = body
        AppLog.info(`Set body ${index}: m ${mass}, r ${body.pos}, v ${body.vel}`)
        this.emit('bodySet', { index })
    }

    /**
     * Remove a body; later bodies move down one index. State keyed by index
     * outside the simulation (colors, selection) is the caller's to re-key.
     */
    removeBody(index: number): void {
        this.checkIndex(index)
        this.bodies.splice(index, 1)
        AppLog.info(`Removed body ${index}, ${this.bodies.length} left`)
        this.emit('bodyRemoved', { index })
    }

    /** Remove every body and reset the clock */
    clear(): void {
        const count = this.bodies.length
        this.bodies = []
        this._time = 0
        this.emit('cleared', { count })
    }

    getBody(index: number): BodyData {
        this.checkIndex(index)
        return toBodyData(this.bodies[index])
    }

    getBodies(): BodyData[] {
        return this.bodies.map(toBodyData)
    }

    getState(i: number): BodyState {
        this.checkIndex(i)
        return copyState(this.bodies[i])
    }

    // ==================== Forces ====================

    /**
     * Net gravitational acceleration on body i placed at `state` (its stored
     * state by default), with every other body at its stored position.
     * Contributions are summed in ascending index order.
     */
    computeAcceleration(i: number, state?: BodyState): Vec3 {
        this.checkIndex(i)
        const pos = (state ?? this.bodies[i]).pos
        const acc = Vec3.zero()

        for (let j = 0; j < this.bodies.length; j++) {
            if (j === i) continue
            const other = this.bodies[j]
            const offset = Vec3.sub(other.pos, pos)
            const dist = offset.len()
            const k = this._G * other.mass / (dist * dist * dist)
            if (!Number.isFinite(k)) {
                throw new SingularConfigurationError(i, j)
            }
            acc.addScaled(offset, k)
        }
        return acc
    }

    /** ODE right-hand side for body i: (velocity, acceleration) */
    derivative(i: number, state?: BodyState): BodyState {
        const s = state ?? this.getState(i)
        return {
            pos: s.vel.copy(),
            vel: this.computeAcceleration(i, s)
        }
    }

    /** Sum of m_i * a_i over all bodies; zero up to rounding */
    netForce(): Vec3 {
        const total = Vec3.zero()
        for (let i = 0; i < this.bodies.length; i++) {
            total.addScaled(this.computeAcceleration(i), this.bodies[i].mass)
        }
        return total
    }

    // ==================== Integration ====================

    /** Advance by dt with the selected strategy */
    step(dt: number): void {
        this.advance(this.integrator, dt)
    }

    stepEuler(dt: number): void {
        this.advance(Euler, dt)
    }

    stepSemiImplicitEuler(dt: number): void {
        this.advance(SemiImplicitEuler, dt)
    }

    stepModifiedEuler(dt: number): void {
        this.advance(ModifiedEuler, dt)
    }

    stepRungeKutta(dt: number): void {
        this.advance(RungeKutta, dt)
    }

    private advance(integrator: Integrator, dt: number): void {
        if (!Number.isFinite(dt) || dt <= 0) {
            throw new InvalidTimeStepError(dt)
        }

        let next: BodyState[]
        try {
            next = integrator.integrate(this, dt)
            checkFinite(next)
        } catch (err) {
            if (err instanceof SimulationError) {
                AppLog.warn(`${integrator.label} step at t=${this._time.toFixed(3)} aborted: ${err.message}`)
            }
            throw err
        }

        // Commit only once every body has been evaluated
        for (let i = 0; i < next.length; i++) {
            const body = this.bodies[i]
            body.pos = next[i].pos
            body.vel = next[i].vel
        }
        this._time += dt
        this.emit('stepped', { time: this._time, dt })
    }

    // ==================== Diagnostics ====================

    kineticEnergy(): number {
        let e = 0
        for (const body of this.bodies) {
            e += body.mass * body.vel.lenSq() / 2
        }
        return e
    }

    /** Gravitational potential energy, each unordered pair counted once */
    potentialEnergy(): number {
        let e = 0
        const n = this.bodies.length
        for (let i = 0; i < n; i++) {
            const a = this.bodies[i]
            for (let j = i + 1; j < n; j++) {
                const b = this.bodies[j]
                const dist = Vec3.distance(a.pos, b.pos)
                if (dist === 0) {
                    throw new SingularConfigurationError(i, j)
                }
                e -= this._G * a.mass * b.mass / dist
            }
        }
        return e
    }

    totalEnergy(): number {
        return this.kineticEnergy() + this.potentialEnergy()
    }

    centerOfMass(): Vec3 {
        const sum = Vec3.zero()
        let totalMass = 0
        for (const body of this.bodies) {
            sum.addScaled(body.pos, body.mass)
            totalMass += body.mass
        }
        if (totalMass <= 0) {
            throw new EmptySystemError('Center of mass')
        }
        return sum.scale(1 / totalMass)
    }

    linearMomentum(): Vec3 {
        const p = Vec3.zero()
        for (const body of this.bodies) {
            p.addScaled(body.vel, body.mass)
        }
        return p
    }

    /**
     * Angular momentum about `frame` (origin at rest by default).
     * Returns only the z component: orbits are expected in the xy-plane.
     * Use angularMomentumVector() for the full vector.
     */
    angularMomentum(frame: ReferenceFrame = {}): number {
        return this.angularMomentumVector(frame).z
    }

    angularMomentumVector(frame: ReferenceFrame = {}): Vec3 {
        const rp = frame.position ? Vec3.from(frame.position) : Vec3.zero()
        const rv = frame.velocity ? Vec3.from(frame.velocity) : Vec3.zero()
        const L = Vec3.zero()
        for (const body of this.bodies) {
            const r = Vec3.sub(body.pos, rp)
            const v = Vec3.sub(body.vel, rv)
            L.addScaled(Vec3.cross(r, v), body.mass)
        }
        return L
    }

    /** Body positions split per axis, in index order */
    positionsByAxis(): AxisPositions {
        return {
            x: this.bodies.map(b => b.pos.x),
            y: this.bodies.map(b => b.pos.y),
            z: this.bodies.map(b => b.pos.z)
        }
    }

    // ==================== Events ====================

    on<T extends SimulationEvent>(event: T, callback: EventCallback<T>): void {
        this.listenersFor(event).add(callback)
    }

    off<T extends SimulationEvent>(event: T, callback: EventCallback<T>): void {
        this.listenersFor(event).delete(callback)
    }

    private emit<T extends SimulationEvent>(event: T, data: SimulationEventData[T]): void {
        for (const callback of this.listenersFor(event)) {
            callback(data)
        }
    }

    private listenersFor<T extends SimulationEvent>(event: T): Set<EventCallback<T>> {
        return this.listeners[event]
    }

    private checkIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.bodies.length) {
            throw new OutOfRangeError(index, this.bodies.length)
        }
    }
}

/** Near-collisions can overflow without any pair coefficient going non-finite */
function checkFinite(next: readonly BodyState[]): void {
    const index = next.findIndex(s => !s.pos.isFinite() || !s.vel.isFinite())
    if (index >= 0) {
        throw new NonFiniteStateError(index)
    }
}

function validateG(g: number): number {
    if (!Number.isFinite(g) || g < 0) {
        throw new RangeError(`Gravitational constant must be finite and non-negative, got ${g}`)
    }
    return g
}
