import { z } from 'zod';

/**
 * Accepts both `odata=nometadata` collections (`{ value: [...] }`) and verbose ones
 * (`{ d: { results: [...] } }`).
 */
const odataCollection = <T extends z.ZodType>(item: T) =>
  z
    .union([
      z.object({ value: z.array(item) }),
      z.object({ d: z.object({ results: z.array(item) }) }),
    ])
    .transform((response) => ('value' in response ? response.value : response.d.results));

const WebSchema = z.object({
  Title: z.string().prefault(''),
  Description: z.string().optional(),
  WebTemplate: z.string().optional(),
  Created: z.string().optional(),
  LastItemModifiedDate: z.string().optional(),
});

export const WebResponseSchema = z
  .union([z.object({ d: WebSchema }), WebSchema])
  .transform((response) => ('d' in response ? response.d : response));

export type SiteInfo = z.infer<typeof WebResponseSchema>;

const ListSchema = z
  .object({
    Id: z.string(),
    Title: z.string(),
    ItemCount: z.number().int().prefault(0),
    Hidden: z.boolean().prefault(false),
    BaseTemplate: z.number().int(),
    Created: z.string().optional(),
    LastItemModifiedDate: z.string().optional(),
    RootFolder: z.object({ ServerRelativeUrl: z.string() }).optional(),
  })
  .transform((list) => ({
    id: list.Id,
    title: list.Title,
    itemCount: list.ItemCount,
    hidden: list.Hidden,
    baseTemplate: list.BaseTemplate,
    created: list.Created,
    lastItemModifiedDate: list.LastItemModifiedDate,
    serverRelativeUrl: list.RootFolder?.ServerRelativeUrl ?? '',
  }));

export const ListsResponseSchema = odataCollection(ListSchema);

export type ListInfo = z.infer<typeof ListSchema>;

export const RenderListDataResponseSchema = z.object({
  Row: z.array(z.record(z.string(), z.unknown())).prefault([]),
  NextHref: z.string().optional(),
});

export type RenderListDataRow = Record<string, unknown>;

const SiteUserSchema = z.object({
  Id: z.number().int(),
  LoginName: z.string().prefault(''),
  Title: z.string().prefault(''),
  Email: z.string().nullish(),
  IsSiteAdmin: z.boolean().prefault(false),
  PrincipalType: z.number().int().prefault(0),
});

export const SiteUsersResponseSchema = odataCollection(SiteUserSchema);

export type SiteUser = z.infer<typeof SiteUserSchema>;
