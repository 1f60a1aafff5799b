import { z } from 'zod';

const linkItem = z.object({
  link: z.string().optional(),
  title: z.string().optional(),
  snippet: z.string().optional(),
  position: z.number().optional()
});

export const searchResponseSchema = z.object({
  organic: z.array(linkItem).default([]),
  ads: z.array(linkItem).default([]),
  shopping: z.array(linkItem).default([]),
  relatedSearches: z.array(z.object({ query: z.string() })).default([])
});

export const mapsResponseSchema = z.object({
  places: z
    .array(
      z.object({
        title: z.string().default(''),
        address: z.string().default(''),
        phoneNumber: z.string().default(''),
        website: z.string().default(''),
        rating: z.number().optional(),
        ratingCount: z.number().optional(),
        reviews: z.number().optional(),
        category: z.string().optional(),
        type: z.string().optional(),
        placeId: z.string().optional(),
        cid: z.string().optional(),
        position: z.number().optional()
      })
    )
    .default([])
});

export const autocompleteResponseSchema = z.object({
  suggestions: z.array(z.union([z.object({ value: z.string() }), z.string()])).default([])
});

export type SearchResponse = z.output<typeof searchResponseSchema>;
export type MapsResponse = z.output<typeof mapsResponseSchema>;
export type MapsPlace = MapsResponse['places'][number];
