/**
 * Simulation defaults.
 * Centralized so the driver and tests agree on the same scene parameters.
 */
export const SimulationConfig = {
    /** Gravitational constant in scene units */
    G: 0.8,

    /** Largest frame delta (s) the driver passes to step() */
    maxStep: 0.03,

    /** Driver tick rate (Hz) */
    tickRate: 120,

    /** Integration strategy selected at start-up */
    strategy: 'semi-implicit-euler'
} as const
