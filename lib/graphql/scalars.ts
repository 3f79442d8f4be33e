import { GraphQLScalarType, Kind } from 'graphql'

function finiteOrNull(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null
}

/**
 * Numeric widget value. Fractions, huge numbers and non-numbers all coerce
 * instead of failing validation; `normalizeCollisionFilter` decides what a
 * value means, and anything that is not a finite number arrives as null.
 */
export const FilterNumber = new GraphQLScalarType<number | null, number | null>({
  name: 'FilterNumber',
  description: 'A numeric filter value. Anything that is not a finite number reads as null.',
  serialize: finiteOrNull,
  parseValue: finiteOrNull,
  parseLiteral: (ast) =>
    ast.kind === Kind.INT || ast.kind === Kind.FLOAT ? finiteOrNull(Number(ast.value)) : null,
})
