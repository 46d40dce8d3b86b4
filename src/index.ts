// Core simulation exports
export {
    Simulation,
    type SimulationOptions,
    type SimulationEvent,
    type SimulationEventData,
    type ReferenceFrame,
    type AxisPositions
} from './sim/Simulation.js'
export { SimulationDriver, type DriverOptions } from './sim/SimulationDriver.js'
export { SimulationConfig } from './sim/SimulationConfig.js'
export { createBody, type Body, type BodyData, type BodyState, type VectorInput } from './sim/Body.js'

// Integrators
export {
    Euler,
    SemiImplicitEuler,
    ModifiedEuler,
    RungeKutta,
    INTEGRATORS,
    createIntegrator,
    parseStrategy,
    type Integrator,
    type DerivativeSource,
    type StrategyName
} from './sim/integrators.js'

// Scenes
export { createPreset, loadPreset, PRESET_NAMES, type PresetName } from './sim/presets.js'

// Errors
export {
    SimulationError,
    OutOfRangeError,
    EmptySystemError,
    SingularConfigurationError,
    UnsupportedStrategyError,
    InvalidBodyError,
    InvalidTimeStepError,
    UnknownPresetError,
    NonFiniteStateError,
    type SimulationErrorCode
} from './sim/errors.js'

// Utilities
export { default as Vec3, vec3, type IVec3, type Vec3Tuple } from './lib/Vector3.js'
export { AppLog, Logger, type LogEntry, type LogLevel } from './AppLog.js'
export {
    measureDrift,
    compareIntegrators,
    formatDriftTable,
    type DriftScene,
    type DriftResult
} from './benchmark/Benchmark.js'
