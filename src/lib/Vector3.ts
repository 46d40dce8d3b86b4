// 3D vector for body state and diagnostics

export type Vec3Tuple = readonly [number, number, number]

export interface IVec3 {
    x: number
    y: number
    z: number
}

export function vec3(v: IVec3 | Vec3Tuple): Vec3
export function vec3(x: number, y: number, z: number): Vec3
export function vec3(xyz: number): Vec3
export function vec3(xv: number | IVec3 | Vec3Tuple, y?: number, z?: number): Vec3 {
    if (typeof xv === 'number') {
        return new Vec3(xv, y ?? xv, z ?? xv)
    }
    return Vec3.from(xv)
}

export default class Vec3 implements IVec3 {
    constructor(
        public x: number,
        public y: number,
        public z: number
    ) {}

    set(v: IVec3): Vec3 {
        this.x = v.x
        this.y = v.y
        this.z = v.z
        return this
    }

    copy(): Vec3 {
        return new Vec3(this.x, this.y, this.z)
    }

    add(v: IVec3): Vec3 {
        this.x += v.x
        this.y += v.y
        this.z += v.z
        return this
    }

    sub(v: IVec3): Vec3 {
        this.x -= v.x
        this.y -= v.y
        this.z -= v.z
        return this
    }

    scale(s: number): Vec3 {
        this.x *= s
        this.y *= s
        this.z *= s
        return this
    }

    /** this += v * s */
    addScaled(v: IVec3, s: number): Vec3 {
        this.x += v.x * s
        this.y += v.y * s
        this.z += v.z * s
        return this
    }

    /**
     * Round every component to the nearest single-precision float and widen
     * it back to a double.
     */
    fround(): Vec3 {
        this.x = Math.fround(this.x)
        this.y = Math.fround(this.y)
        this.z = Math.fround(this.z)
        return this
    }

    len(): number {
        return Math.sqrt(this.x * this.x + this.y * this.y + this.z * this.z)
    }

    lenSq(): number {
        return this.x * this.x + this.y * this.y + this.z * this.z
    }

    isFinite(): boolean {
        return Number.isFinite(this.x) && Number.isFinite(this.y) && Number.isFinite(this.z)
    }

    toArray(): [number, number, number] {
        return [this.x, this.y, this.z]
    }

    toString(): string {
        return `(${this.x}, ${this.y}, ${this.z})`
    }

    // ###################################################
    //    STATIC FUNCTIONS - always returns a new vector
    // ###################################################

    static from(v: IVec3 | Vec3Tuple): Vec3 {
        if (isTuple(v)) {
            return new Vec3(v[0], v[1], v[2])
        }
        return new Vec3(v.x, v.y, v.z)
    }

    static add(a: IVec3, b: IVec3): Vec3 {
        return new Vec3(a.x + b.x, a.y + b.y, a.z + b.z)
    }

    static sub(a: IVec3, b: IVec3): Vec3 {
        return new Vec3(a.x - b.x, a.y - b.y, a.z - b.z)
    }

    static scale(a: IVec3, s: number): Vec3 {
        return new Vec3(a.x * s, a.y * s, a.z * s)
    }

    static len(a: IVec3): number {
        return Math.sqrt(a.x * a.x + a.y * a.y + a.z * a.z)
    }

    static distance(a: IVec3, b: IVec3): number {
        return Vec3.len(Vec3.sub(b, a))
    }

    static cross(a: IVec3, b: IVec3): Vec3 {
        return new Vec3(
            a.y * b.z - a.z * b.y,
            a.z * b.x - a.x * b.z,
            a.x * b.y - a.y * b.x
        )
    }

    static zero(): Vec3 {
        return new Vec3(0, 0, 0)
    }
}

function isTuple(v: IVec3 | Vec3Tuple): v is Vec3Tuple {
    return Array.isArray(v)
}
