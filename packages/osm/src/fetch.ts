/**
 * Fetch collaborator: resolve a place with Nominatim, query Overpass, and
 * reduce the result to compact POI records.
 *
 * Requests are made once; retry and back-off policies are left to the
 * caller. All HTTP goes through an injectable `fetch`.
 *
 * @module
 */

import { FuseError } from "@cityfuse/shared/errors"
import { isRecord } from "@cityfuse/shared/guards"
import {
	type ProgressCallback,
	logProgress,
	progressLogger,
} from "@cityfuse/shared/progress"
import {
	areaClause,
	bboxClause,
	buildOverpassQuery,
	overpassAreaId,
	type PoiCategories,
	POI_CATEGORIES,
} from "./overpass"
import { elementPosition, simplifyElement } from "./simplify"
import type { OsmRecord, OverpassElement, OverpassResponse } from "./types"

export interface HttpResponse {
	ok: boolean
	status: number
	json(): Promise<unknown>
	text(): Promise<string>
}

export type FetchLike = (
	url: string,
	init?: {
		method?: string
		headers?: Record<string, string>
		body?: string
	},
) => Promise<HttpResponse>

export interface OsmClientOptions {
	overpassUrl: string
	nominatimUrl: string
	userAgent: string
	/** Half size in degrees of the box used when a place has no area. */
	fallbackDelta: number
	fetch: FetchLike
}

export const DEFAULT_CLIENT_OPTIONS: OsmClientOptions = {
	overpassUrl: "https://overpass-api.de/api/interpreter",
	nominatimUrl: "https://nominatim.openstreetmap.org/search",
	userAgent: "cityfuse/0.1",
	fallbackDelta: 0.02,
	fetch: (url, init) => fetch(url, init),
}

/** Statuses for which the area query falls back to a bounding box query. */
const OVERLOAD_STATUSES = new Set([429, 502, 503, 504])

export class HttpStatusError extends FuseError {
	readonly status: number

	constructor(url: string, status: number, body: string) {
		super("FetchError", `${url} returned status ${status}: ${body.slice(0, 500)}`)
		this.status = status
	}
}

export interface GeoBounds {
	south: number
	west: number
	north: number
	east: number
}

export interface ResolvedPlace {
	name: string
	/** Clause selecting the place's area, or the fallback box for nodes. */
	areaClause: string
	/** Clause selecting a small box around the place centre. */
	fallbackClause: string
	bounds: GeoBounds
}

function toNumber(value: unknown): number {
	const n = typeof value === "string" ? Number.parseFloat(value) : value
	if (typeof n !== "number" || !Number.isFinite(n)) {
		throw new FuseError("FetchError", `Expected a number, got ${String(value)}`)
	}
	return n
}

function isOverpassResponse(value: unknown): value is OverpassResponse {
	return isRecord(value) && Array.isArray(value["elements"])
}

/**
 * Look up a place name ("Karlsruhe,Germany") and derive Overpass clauses.
 */
export async function resolvePlace(
	name: string,
	options: Partial<OsmClientOptions> = {},
): Promise<ResolvedPlace> {
	const client = { ...DEFAULT_CLIENT_OPTIONS, ...options }
	const params = new URLSearchParams({
		q: name,
		format: "json",
		limit: "1",
		addressdetails: "1",
	})
	const url = `${client.nominatimUrl}?${params}`
	const response = await client.fetch(url, {
		headers: { "User-Agent": client.userAgent },
	})
	if (!response.ok) {
		throw new HttpStatusError(url, response.status, await response.text())
	}
	const results = await response.json()
	const first = Array.isArray(results) ? results[0] : undefined
	if (!isRecord(first)) {
		throw new FuseError("FetchError", `Nominatim returned no result for ${name}`)
	}
	const lat = toNumber(first["lat"])
	const lon = toNumber(first["lon"])
	const box = first["boundingbox"]
	if (!Array.isArray(box) || box.length !== 4) {
		throw new FuseError("FetchError", `Nominatim result for ${name} has no bounding box`)
	}
	// Nominatim order: [south, north, west, east]
	const bounds: GeoBounds = {
		south: toNumber(box[0]),
		north: toNumber(box[1]),
		west: toNumber(box[2]),
		east: toNumber(box[3]),
	}
	const d = client.fallbackDelta
	const fallbackClause = bboxClause(lat - d, lon - d, lat + d, lon + d)
	const osmType = first["osm_type"]
	const osmId = first["osm_id"]
	let clause = fallbackClause
	if ((osmType === "relation" || osmType === "way") && osmId !== undefined) {
		clause = areaClause(overpassAreaId(osmType, toNumber(osmId)))
	}
	return { name, areaClause: clause, fallbackClause, bounds }
}

/**
 * POST a query to Overpass.
 *
 * @throws HttpStatusError on a non-success status.
 */
export async function fetchOverpass(
	query: string,
	options: Partial<OsmClientOptions> = {},
): Promise<OverpassResponse> {
	const client = { ...DEFAULT_CLIENT_OPTIONS, ...options }
	const response = await client.fetch(client.overpassUrl, {
		method: "POST",
		headers: {
			"Content-Type": "application/x-www-form-urlencoded",
			"User-Agent": client.userAgent,
		},
		body: new URLSearchParams({ data: query }).toString(),
	})
	if (!response.ok) {
		throw new HttpStatusError(
			client.overpassUrl,
			response.status,
			await response.text(),
		)
	}
	const body = await response.json()
	if (!isOverpassResponse(body)) {
		throw new FuseError("FetchError", "Overpass response has no elements")
	}
	return body
}

/** Check whether an element lies inside the bounds (edges inclusive). */
export function isWithinBounds(element: OverpassElement, bounds: GeoBounds) {
	const position = elementPosition(element)
	if (!position) return false
	const [lon, lat] = position
	return (
		lat >= bounds.south &&
		lat <= bounds.north &&
		lon >= bounds.west &&
		lon <= bounds.east
	)
}

export interface FetchPlaceOptions extends Partial<OsmClientOptions> {
	categories?: PoiCategories
}

export interface FetchPlaceResult {
	place: ResolvedPlace
	records: OsmRecord[]
	/** Elements dropped because they lie outside the place's bounds. */
	outliers: number
	/** True when the bounding box fallback query was used. */
	usedFallback: boolean
}

async function runAreaQuery(
	query: string,
	options: Partial<OsmClientOptions>,
	log: ReturnType<typeof progressLogger>,
): Promise<OverpassElement[]> {
	try {
		return (await fetchOverpass(query, options)).elements
	} catch (error) {
		if (error instanceof HttpStatusError && OVERLOAD_STATUSES.has(error.status)) {
			log.warn(`Area query failed with status ${error.status}`)
			return []
		}
		throw error
	}
}

/**
 * Fetch the points of interest of a place.
 *
 * Runs the area query first and, when it yields nothing, the same query over
 * a small box around the place centre. Elements outside the place's bounding
 * box are dropped.
 */
export async function fetchPlaceObjects(
	placeName: string,
	{ categories = POI_CATEGORIES, ...options }: FetchPlaceOptions = {},
	onProgress: ProgressCallback = logProgress,
): Promise<FetchPlaceResult> {
	const log = progressLogger(onProgress)
	log.info(`Resolving ${placeName} with Nominatim...`)
	const place = await resolvePlace(placeName, options)

	let usedFallback = false
	let elements = await runAreaQuery(
		buildOverpassQuery(place.areaClause, categories),
		options,
		log,
	)
	log.info(`Area query returned ${elements.length} elements`)
	if (elements.length === 0 && place.areaClause !== place.fallbackClause) {
		log.warn("No results for the area, querying a bounding box around the centre")
		usedFallback = true
		const fallback = buildOverpassQuery(place.fallbackClause, categories)
		elements = (await fetchOverpass(fallback, options)).elements
		log.info(`Bounding box query returned ${elements.length} elements`)
	}

	const inside = elements.filter((el) => isWithinBounds(el, place.bounds))
	const outliers = elements.length - inside.length
	log.info(`Dropped ${outliers} elements outside the place bounds`)

	const records: OsmRecord[] = []
	for (const element of inside) {
		const record = simplifyElement(element)
		if (record) records.push(record)
	}
	return { place, records, outliers, usedFallback }
}
