/**
 * Story record as returned by the archive API.
 * Every field is optional and a value of the wrong type reads as absent.
 */

import { z } from "zod";


const text = z.union([z.string(), z.number().transform(String)]).nullish().catch(null);
const identifier = z.union([z.string(), z.number()]).nullish().catch(null);


export const storySchema = z
  .object({
    /** Archive id, used as a non-permalink guid when there is no link */
    id: identifier,
    /** Headline */
    name: text,
    /** Canonical URL */
    link: text,
    /** Short rich-text teaser */
    description: text,
    /** Full rich-text body */
    content: text,
    image: text,
    thumbnail: text,
    issue_number: identifier,
  })
  .passthrough();


export type StoryRecord = z.infer<typeof storySchema>;


/** One page of the paginated API response */
export const storyPageSchema = z.object({
  data: z.array(z.unknown()).nullish(),
  meta: z
    .object({ total_pages: z.number().int().nullish().catch(null) })
    .passthrough()
    .nullish()
    .catch(null),
});


export type StoryPageBody = z.infer<typeof storyPageSchema>;
