import { parseMedalsPayload } from "./parser";
import { parseTables, type DataTable } from "./table";
import type { EventContext } from "./types";

export interface FetchOptions {
  accept?: string;
  timeoutMs?: number;
}

export type TextFetcher = (url: string, options?: FetchOptions) => Promise<string>;

interface BaseSource {
  readonly url: string;
  readonly label: string;
  fetchTables(fetchText: TextFetcher): Promise<DataTable[]>;
}

/** A Wikipedia page listing many events or the overall medal table */
export interface WikipediaAggregatePage extends BaseSource {
  readonly kind: "wikipedia";
}

/** A page covering one event, e.g. "Luge – Women's singles" */
export interface PerSportPage extends BaseSource {
  readonly kind: "per-sport";
  readonly event: EventContext;
}

/** A JSON medal feed, or an HTML page embedding one as __NEXT_DATA__ */
export interface JsonMedalApi extends BaseSource {
  readonly kind: "json-api";
}

export type TableSource = WikipediaAggregatePage | PerSportPage | JsonMedalApi;

export function wikipediaAggregatePage(url: string): WikipediaAggregatePage {
  return {
    kind: "wikipedia",
    url,
    label: labelFor(url),
    fetchTables: async (fetchText) =>
      parseTables(await fetchText(url, { accept: "text/html" })),
  };
}

export function perSportPage(url: string, event: EventContext): PerSportPage {
  const gender = event.gender ? `${event.gender} ` : "";
  return {
    kind: "per-sport",
    url,
    event,
    label: `${gender}${event.sport}: ${event.eventName}`,
    fetchTables: async (fetchText) =>
      parseTables(await fetchText(url, { accept: "text/html" })),
  };
}

export function jsonMedalApi(url: string): JsonMedalApi {
  return {
    kind: "json-api",
    url,
    label: labelFor(url),
    fetchTables: async (fetchText) => [
      parseMedalsPayload(
        await fetchText(url, { accept: "application/json, text/html" }),
        url,
      ),
    ],
  };
}

function labelFor(url: string): string {
  try {
    const parsed = new URL(url);
    const page = decodeURIComponent(parsed.pathname.split("/").pop() || "");
    return page ? `${parsed.hostname} ${page.replace(/_/g, " ")}` : parsed.hostname;
  } catch {
    return url;
  }
}
