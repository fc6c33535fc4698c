import { z } from 'zod';

// ============================================
// ENTITY SCHEMAS
// ============================================

export const OrganizationSchema = z.object({
  organizationId: z.string(),
  name: z.string(),
});

export const BoardSchema = z.object({
  widgetCommonId: z.string(),
  organizationId: z.string(),
  name: z.string(),
  type: z.enum(['board', 'backlog']),
  color: z.string().nullish(),
  archived: z.boolean().default(false),
  collectionIds: z.array(z.string()).default([]),
});

export const ColumnSchema = z.object({
  columnId: z.string(),
  organizationId: z.string(),
  widgetCommonId: z.string(),
  name: z.string(),
  position: z.number().int(),
  cardCount: z.number().int().default(0),
});

export const AssignmentSchema = z.object({
  userId: z.string(),
  completed: z.boolean().default(false),
});

export const CardSchema = z.object({
  cardId: z.string(),
  cardCommonId: z.string(),
  organizationId: z.string(),
  widgetCommonId: z.string().nullish(),
  columnId: z.string().nullish(),
  sequentialId: z.number().int(),
  name: z.string(),
  detailedDescription: z.string().nullish(),
  tags: z.array(z.string()).default([]),
  assignments: z.array(AssignmentSchema).default([]),
  startDate: z.string().nullish(),
  dueDate: z.string().nullish(),
  tasksTotal: z.number().int().default(0),
  tasksDone: z.number().int().default(0),
  numComments: z.number().int().default(0),
  listPosition: z.number().nullish(),
  archived: z.boolean().default(false),
});

export const TagSchema = z.object({
  tagId: z.string(),
  organizationId: z.string(),
  name: z.string(),
  color: z.string().nullish(),
});

export const UserSchema = z.object({
  userId: z.string(),
  name: z.string(),
  email: z.string(),
  organizationRole: z.string().nullish(),
});

export type Organization = z.infer<typeof OrganizationSchema>;
export type Board = z.infer<typeof BoardSchema>;
export type Column = z.infer<typeof ColumnSchema>;
export type Assignment = z.infer<typeof AssignmentSchema>;
export type Card = z.infer<typeof CardSchema>;
export type Tag = z.infer<typeof TagSchema>;
export type User = z.infer<typeof UserSchema>;

// ============================================
// PAGINATION ENVELOPE
// ============================================

export const PageSchema = z.object({
  limit: z.number().int().optional(),
  page: z.number().int(),
  pages: z.number().int(),
  requestId: z.string().optional(),
  entities: z.array(z.unknown()),
});

export type Page = z.infer<typeof PageSchema>;

// ============================================
// STORED SETTINGS
// ============================================

export const StoredSettingsSchema = z.object({
  email: z.string().email().optional(),
  token: z.string().min(1).optional(),
  organizationId: z.string().min(1).optional(),
  boardId: z.string().min(1).optional(),
});

export type StoredSettings = z.infer<typeof StoredSettingsSchema>;
