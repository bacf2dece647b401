import { z } from "zod";

// DOCX model tools schemas
export const ReadDocxModelArgsSchema = z.object({
  path: z.string(),
  format: z.enum(['text', 'json']).optional().default('text'),
});

export const GetDocxCommentArgsSchema = z.object({
  path: z.string(),
  commentId: z.string(),
});

export const GetDocxHyperlinkArgsSchema = z.object({
  path: z.string(),
  relationshipId: z.string(),
});

export const GetDocxPartArgsSchema = z.object({
  path: z.string(),
  relationshipId: z.string(),
});

export const GetDocxStylesArgsSchema = z.object({
  path: z.string(),
});

export const GetDocxHeaderFooterArgsSchema = z.object({
  path: z.string(),
  page: z.number().int().min(1),
});
