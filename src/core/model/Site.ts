export interface Site {
	id: string;
	name: string;
	url?: string;
	groupIds?: string[];
	metadata?: Record<string, unknown>; // extra platform data
}

export function createSite(
	id: string,
	name: string,
	options?: {
		url?: string;
		groupIds?: string[];
		metadata?: Record<string, unknown>;
	},
): Site {
	return {
		id,
		name,
		url: options?.url,
		groupIds: options?.groupIds ?? [],
		metadata: options?.metadata,
	};
}
