export type SimulationErrorCode =
    | 'OutOfRange'
    | 'EmptySystem'
    | 'SingularConfiguration'
    | 'UnsupportedStrategy'
    | 'InvalidBody'
    | 'InvalidTimeStep'
    | 'UnknownPreset'
    | 'NonFiniteState'

/**
 * Base class for every error thrown by the simulation core.
 * A thrown SimulationError never leaves the simulation half-updated.
 */
export class SimulationError extends Error {
    constructor(
        readonly code: SimulationErrorCode,
        message: string
    ) {
        super(message)
        this.name = new.target.name
    }
}

export class OutOfRangeError extends SimulationError {
    constructor(
        readonly index: number,
        readonly count: number
    ) {
        super('OutOfRange', `Body index ${index} is out of range (body count ${count})`)
    }
}

export class EmptySystemError extends SimulationError {
    constructor(query: string) {
        super('EmptySystem', `${query} is undefined for a system without mass`)
    }
}

export class SingularConfigurationError extends SimulationError {
    constructor(
        readonly i: number,
        readonly j: number
    ) {
        super('SingularConfiguration', `Bodies ${i} and ${j} are coincident`)
    }
}

export class UnsupportedStrategyError extends SimulationError {
    constructor(readonly strategy: string) {
        super('UnsupportedStrategy', `Unsupported integration strategy: ${strategy}`)
    }
}

export class InvalidBodyError extends SimulationError {
    constructor(reason: string) {
        super('InvalidBody', `Invalid body: ${reason}`)
    }
}

export class InvalidTimeStepError extends SimulationError {
    constructor(readonly dt: number) {
        super('InvalidTimeStep', `Time step must be finite and positive, got ${dt}`)
    }
}

export class UnknownPresetError extends SimulationError {
    constructor(readonly preset: string) {
        super('UnknownPreset', `Unknown preset: ${preset}`)
    }
}

export class NonFiniteStateError extends SimulationError {
    constructor(readonly index: number) {
        super('NonFiniteState', `Step would leave body ${index} with a non-finite state`)
    }
}
