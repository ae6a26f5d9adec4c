/** Two frames cannot be interpolated because their player lists differ in length */
export class InterpolationMismatchError extends Error {
  constructor(fromCount: number, toCount: number) {
    super(`Cannot interpolate between frames with ${fromCount} and ${toCount} players`)
    this.name = 'InterpolationMismatchError'
  }
}
