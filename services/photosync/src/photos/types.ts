import { z } from "zod";

export const MediaItemSchema = z.object({
	id: z.string(),
	description: z.string().optional(),
	productUrl: z.string().optional(),
	baseUrl: z.string().optional(),
	mimeType: z.string().default("application/octet-stream"),
	filename: z.string(),
	mediaMetadata: z.object({
		creationTime: z.string(),
		width: z.string().optional(),
		height: z.string().optional(),
		photo: z.object({}).passthrough().optional(),
		video: z.object({}).passthrough().optional(),
	}),
});

export const SearchResponseSchema = z.object({
	mediaItems: z.array(MediaItemSchema).optional(),
	nextPageToken: z.string().optional(),
});

export const StatusSchema = z.object({
	code: z.number().optional(),
	message: z.string().optional(),
});

export const BatchGetResponseSchema = z.object({
	mediaItemResults: z
		.array(
			z.object({
				mediaItem: MediaItemSchema.optional(),
				status: StatusSchema.optional(),
			})
		)
		.default([]),
});

export type MediaItem = z.infer<typeof MediaItemSchema>;
export type SearchResponse = z.infer<typeof SearchResponseSchema>;
export type BatchGetResponse = z.infer<typeof BatchGetResponseSchema>;
export type MediaItemResult = BatchGetResponse["mediaItemResults"][number];

export interface CalendarDate {
	year: number;
	month: number;
	day: number;
}

export interface DateRange {
	startDate: CalendarDate;
	endDate: CalendarDate;
}

export interface PhotosApiOptions {
	baseUrl?: string;
	pageSize?: number;
}

export interface AccessTokenProvider {
	accessToken(): Promise<string>;
}
