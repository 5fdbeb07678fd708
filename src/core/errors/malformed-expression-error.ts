export class MalformedExpressionError extends Error {
  constructor(
    public readonly expression: string,
    public readonly reason: string
  ) {
    super(`Malformed amount expression "${expression}": ${reason}`)
    this.name = 'MalformedExpressionError'
  }
}
