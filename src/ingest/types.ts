/**
 * Export record schemas
 * Based on the conversations.json format of chat history exports
 */

import { z } from 'zod';

/**
 * Author information. Roles outside the known four are kept as strings
 * and treated as tool output during decoding.
 */
export const AuthorSchema = z.object({
  role: z.string(),
  name: z.string().nullable().optional(),
}).passthrough();
export type Author = z.infer<typeof AuthorSchema>;

/**
 * Content part - text, or an object that may carry text (images do not)
 */
export const ContentPartSchema = z.union([
  z.string(),
  z.object({
    content_type: z.string().optional(),
    text: z.string().optional(),
  }).passthrough(),
  z.null(),
]);
export type ContentPart = z.infer<typeof ContentPartSchema>;

export const ContentSchema = z.object({
  content_type: z.string(),
  parts: z.array(ContentPartSchema).optional(),
  text: z.string().optional(),
}).passthrough();
export type Content = z.infer<typeof ContentSchema>;

export const MessageMetadataSchema = z.object({
  model_slug: z.string().nullable().optional(),
  is_visually_hidden_from_conversation: z.boolean().nullable().optional(),
}).passthrough();
export type MessageMetadata = z.infer<typeof MessageMetadataSchema>;

export const RawMessageSchema = z.object({
  id: z.string(),
  author: AuthorSchema,
  create_time: z.number().nullable().optional(),
  update_time: z.number().nullable().optional(),
  content: ContentSchema.nullable().optional(),
  status: z.string().optional(),
  metadata: MessageMetadataSchema.nullable().optional(),
  recipient: z.string().nullable().optional(),
}).passthrough();
export type RawMessage = z.infer<typeof RawMessageSchema>;

/**
 * Mapping entry - a node with its message and edges
 */
export const MappingEntrySchema = z.object({
  id: z.string().optional(),
  message: RawMessageSchema.nullable().optional(),
  parent: z.string().nullable().optional(),
  children: z.array(z.string()).default([]),
});
export type MappingEntry = z.infer<typeof MappingEntrySchema>;

export const MappingSchema = z.record(z.string(), MappingEntrySchema);
export type Mapping = z.infer<typeof MappingSchema>;

/**
 * One conversation record of an export
 */
export const ConversationRecordSchema = z.object({
  id: z.string().nullable().optional(),
  conversation_id: z.string().nullable().optional(),
  title: z.string().nullable().optional(),
  create_time: z.number().nullable().optional(),
  update_time: z.number().nullable().optional(),
  mapping: MappingSchema,
  current_node: z.string().nullable().optional(),
  default_model_slug: z.string().nullable().optional(),
  is_archived: z.boolean().nullable().optional(),

  // Project association, in lookup order
  project_id: z.string().nullable().optional(),
  project_name: z.string().nullable().optional(),
  folder_id: z.string().nullable().optional(),
  folder_name: z.string().nullable().optional(),
  gizmo_id: z.string().nullable().optional(),
  gizmo_name: z.string().nullable().optional(),
  conversation_template_id: z.string().nullable().optional(),
  conversation_template_name: z.string().nullable().optional(),
  workspace_id: z.string().nullable().optional(),
}).passthrough();
export type ConversationRecord = z.infer<typeof ConversationRecordSchema>;
