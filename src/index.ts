export * from "./lib/engine/kmd"
export { Quat, Vec3 } from "./lib/engine/math"
