/**
 * Translatable entity definitions
 *
 * Each definition names the primary table, its translation table, the
 * localized fields (validated with zod) and the non-localized attributes.
 */

import { z } from 'zod';
import type { EntityDefinition } from '../repositories/types';

const slugSchema = z
  .string()
  .trim()
  .min(1)
  .max(255)
  .regex(/^[\p{L}\p{N}]+(?:-[\p{L}\p{N}]+)*$/u, 'slug may contain letters, digits and single hyphens');

export const categoryFieldsSchema = z.object({
  name: z.string().trim().min(1).max(255),
  slug: slugSchema,
});

export const postFieldsSchema = z.object({
  title: z.string().trim().min(1).max(255),
  slug: slugSchema,
  content: z.string(),
});

export const categoryAttributesSchema = z.object({});

export const postAttributesSchema = z.object({
  categoryId: z.string().min(1),
});

export type CategoryFields = z.infer<typeof categoryFieldsSchema>;
export type PostFields = z.infer<typeof postFieldsSchema>;
export type CategoryAttributes = z.infer<typeof categoryAttributesSchema>;
export type PostAttributes = z.infer<typeof postAttributesSchema>;

export const categoryDefinition: EntityDefinition<CategoryFields, CategoryAttributes> = {
  type: 'category',
  table: 'categories',
  translationTable: 'category_translations',
  fieldsSchema: categoryFieldsSchema,
  fieldColumns: ['name', 'slug'],
  attributesSchema: categoryAttributesSchema,
  attributeColumns: {},
  dependents: [{ table: 'posts', translationTable: 'post_translations', foreignKey: 'category_id' }],
};

export const postDefinition: EntityDefinition<PostFields, PostAttributes> = {
  type: 'post',
  table: 'posts',
  translationTable: 'post_translations',
  fieldsSchema: postFieldsSchema,
  fieldColumns: ['title', 'slug', 'content'],
  attributesSchema: postAttributesSchema,
  attributeColumns: { categoryId: 'category_id' },
  dependents: [],
};
