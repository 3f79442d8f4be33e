import { vi, describe, it, expect, assert } from 'vitest'

vi.mock('@/lib/collisions/dataset', () => ({
  getCollisionDataset: vi.fn().mockResolvedValue({
    records: [],
    source: 'test.csv',
    skippedRows: 0,
    loadedAt: new Date(0),
  }),
}))

import { ApolloServer } from '@apollo/server'
import { typeDefs } from '../typeDefs'
import { resolvers } from '../resolvers'
import { depthLimitRule } from '../depthLimit'

const server = new ApolloServer({ typeDefs, resolvers, validationRules: [depthLimitRule] })

async function run(query: string) {
  const result = await server.executeOperation({ query })
  assert(result.body.kind === 'single')
  return result.body.singleResult
}

describe('depthLimitRule', () => {
  it('lets ordinary queries through', async () => {
    const result = await run(`{ collisionViews { items { id } byHour { hour count } } }`)
    expect(result.errors).toBeUndefined()
    expect(result.data?.collisionViews).toEqual({ items: [], byHour: expect.any(Array) })
  })

  it('rejects queries nested deeper than five levels', async () => {
    const result = await run(`{
      collisionViews {
        ... on CollisionViews {
          ... on CollisionViews {
            ... on CollisionViews {
              items { id }
            }
          }
        }
      }
    }`)
    expect(result.data).toBeUndefined()
    expect(result.errors?.map((e) => e.message)).toEqual(['Query depth limit exceeded (max: 5).'])
  })
})
