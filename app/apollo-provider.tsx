'use client'

import { HttpLink } from '@apollo/client'
import {
  ApolloClient,
  ApolloNextAppProvider,
  InMemoryCache,
} from '@apollo/client-integration-nextjs'

function makeClient() {
  const httpLink = new HttpLink({ uri: '/api/graphql' })

  return new ApolloClient({
    cache: new InMemoryCache({
      typePolicies: {
        Collision: { keyFields: ['id'] },
        // Aggregate rows have no identity of their own; store them inline.
        CollisionResult: { keyFields: false },
        CollisionViews: { keyFields: false },
        MapPoint: { keyFields: false },
        Position: { keyFields: false },
        HourCount: { keyFields: false },
        WeekdayCount: { keyFields: false },
        BoroughFactorCount: { keyFields: false },
        BoroughCount: { keyFields: false },
        HourBreakdown: { keyFields: false },
        MinuteCount: { keyFields: false },
        DateCount: { keyFields: false },
        DateMinuteCount: { keyFields: false },
        StreetCasualties: { keyFields: false },
        FilterOptions: { keyFields: false },
      },
    }),
    link: httpLink,
  })
}

export function ApolloProvider({ children }: React.PropsWithChildren) {
  return <ApolloNextAppProvider makeClient={makeClient}>{children}</ApolloNextAppProvider>
}
