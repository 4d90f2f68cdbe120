import { type ClientSchema, a, defineData } from '@aws-amplify/backend';

const schema = a.schema({
  // Persistent tier of the product lookup cache
  // One record per cache key; never expired by the app
  ProductLookupCache: a
    .model({
      cacheKey: a.string().required(), // normalized name/brand + cache type or refinement hash
      cacheType: a.string().required(), // "standard" | "alternatives" | "refinement"
      productName: a.string(), // original search term
      result: a.json().required(), // serialized LookupResult
      insertedAt: a.integer().required(), // epoch seconds
    })
    .authorization((allow) => [allow.publicApiKey()])
    .secondaryIndexes((index) => [index('cacheKey')]),
});

export type Schema = ClientSchema<typeof schema>;

export const data = defineData({
  schema,
  authorizationModes: {
    defaultAuthorizationMode: 'apiKey',
    apiKeyAuthorizationMode: {
      expiresInDays: 30,
    },
  },
});
