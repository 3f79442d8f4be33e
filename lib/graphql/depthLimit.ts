import { GraphQLError, type SelectionSetNode, type ValidationRule } from 'graphql'

// Rejects queries deeper than MAX_DEPTH before they reach any resolver.
// The schema is shallow (max legitimate depth ≈ 3), so 5 leaves ample headroom.
export const MAX_DEPTH = 5

function selectionDepth(selectionSet: SelectionSetNode | undefined, depth: number): number {
  if (!selectionSet || selectionSet.selections.length === 0) return depth
  return Math.max(
    ...selectionSet.selections.map((selection) =>
      selectionDepth('selectionSet' in selection ? selection.selectionSet : undefined, depth + 1)
    )
  )
}

export const depthLimitRule: ValidationRule = (context) => ({
  Document(doc) {
    for (const def of doc.definitions) {
      const depth = selectionDepth('selectionSet' in def ? def.selectionSet : undefined, 0)
      if (depth > MAX_DEPTH) {
        context.reportError(new GraphQLError(`Query depth limit exceeded (max: ${MAX_DEPTH}).`))
      }
    }
  },
})
