import { z } from "zod";
import { errorForStatus, networkFailure, parseRetryAfter } from "./http";

export interface AmoClientOptions {
  baseUrl: string;
  token: string;
  timeoutMs?: number;
}

interface AmoCustomFieldValue {
  field_id?: number;
  field_code?: string | null;
  values?: { value?: string | number | null; enum_code?: string | null }[] | null;
}

export interface AmoContact {
  id: number;
  name?: string | null;
  updated_at?: number;
  custom_fields_values?: AmoCustomFieldValue[] | null;
}

export interface AmoLead {
  id: number;
  name?: string | null;
  price?: number | null;
  status_id: number;
  pipeline_id: number;
  updated_at?: number;
  _embedded?: {
    contacts?: { id: number; is_main?: boolean }[];
  };
}

export interface AmoStatus {
  id: number;
  name: string;
}

interface AmoLinks {
  next?: { href: string };
}

interface AmoListResponse<T> {
  _links?: AmoLinks;
  _embedded?: T;
}

export interface AmoContactInput {
  id?: number;
  name: string;
  custom_fields_values: AmoCustomFieldValue[];
}

/** An existing contact attached to a lead by id. */
export interface AmoContactRef {
  id: number;
}

export interface AmoLeadInput {
  id?: number;
  price: number;
  status_id?: number;
  pipeline_id?: number;
  _embedded?: { contacts: (AmoContactInput | AmoContactRef)[] };
}

export interface AmoComplexResult {
  id: number;
  contact_id: number | null;
}

const amoErrorSchema = z.object({
  title: z.string().optional(),
  detail: z.string().optional(),
});

function errorDetail(body: string): string | undefined {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch {
    return undefined;
  }
  const parsed = amoErrorSchema.safeParse(json);
  return parsed.success ? parsed.data.detail || parsed.data.title : undefined;
}

const PAGE_LIMIT = 50;
const CONTACT_CHUNK = 50;

interface AmoRequest {
  method?: "GET" | "POST" | "PATCH";
  params?: URLSearchParams;
  body?: unknown;
}

/**
 * Authenticated call against the v4 API. AmoCRM answers an empty list with
 * 204 No Content, which comes back as null.
 */
async function amoFetch<T>(client: AmoClientOptions, path: string, request: AmoRequest = {}): Promise<T | null> {
  const url = new URL(`${client.baseUrl}${path}`);
  if (request.params) {
    url.search = request.params.toString();
  }

  let response: Response;
  try {
    response = await fetch(url.toString(), {
      method: request.method ?? "GET",
      headers: {
        Authorization: `Bearer ${client.token}`,
        "Content-Type": "application/json",
        Accept: "application/json",
      },
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(client.timeoutMs ?? 30_000),
    });
  } catch (err) {
    throw networkFailure("CRM", err);
  }

  if (response.status === 204) {
    return null;
  }

  if (!response.ok) {
    const errorBody = await response.text();
    const message = errorDetail(errorBody) || `AmoCRM API error: ${response.status}`;
    throw errorForStatus("CRM", response.status, message, parseRetryAfter(response.headers.get("retry-after")));
  }

  return response.json() as Promise<T>;
}

export async function* fetchLeads(
  client: AmoClientOptions,
  pipelineId: number,
  beforePage?: () => Promise<void>
): AsyncGenerator<AmoLead[], void, unknown> {
  let page = 1;
  let hasNext = true;

  while (hasNext) {
    const params = new URLSearchParams({
      "filter[pipeline_id]": String(pipelineId),
      with: "contacts",
      page: String(page),
      limit: String(PAGE_LIMIT),
    });

    await beforePage?.();
    const response = await amoFetch<AmoListResponse<{ leads?: AmoLead[] }>>(client, "/api/v4/leads", { params });

    const leads = response?._embedded?.leads ?? [];
    if (leads.length > 0) {
      yield leads;
    }

    hasNext = leads.length > 0 && Boolean(response?._links?.next?.href);
    page++;
  }
}

export async function fetchContactsByIds(
  client: AmoClientOptions,
  ids: number[],
  beforeRequest?: () => Promise<void>
): Promise<Map<number, AmoContact>> {
  const contacts = new Map<number, AmoContact>();
  const unique = [...new Set(ids)];

  for (let i = 0; i < unique.length; i += CONTACT_CHUNK) {
    const params = new URLSearchParams({ limit: String(CONTACT_CHUNK) });
    for (const id of unique.slice(i, i + CONTACT_CHUNK)) {
      params.append("filter[id][]", String(id));
    }

    await beforeRequest?.();
    const response = await amoFetch<AmoListResponse<{ contacts?: AmoContact[] }>>(client, "/api/v4/contacts", {
      params,
    });
    for (const contact of response?._embedded?.contacts ?? []) {
      contacts.set(contact.id, contact);
    }
  }

  return contacts;
}

/** Full-text contact search; AmoCRM matches names and custom field values. */
export async function searchContacts(client: AmoClientOptions, query: string): Promise<AmoContact[]> {
  const response = await amoFetch<AmoListResponse<{ contacts?: AmoContact[] }>>(client, "/api/v4/contacts", {
    params: new URLSearchParams({ query }),
  });
  return response?._embedded?.contacts ?? [];
}

export async function fetchStatuses(client: AmoClientOptions, pipelineId: number): Promise<AmoStatus[]> {
  const response = await amoFetch<AmoListResponse<{ statuses?: AmoStatus[] }>>(
    client,
    `/api/v4/leads/pipelines/${pipelineId}/statuses`
  );
  return response?._embedded?.statuses ?? [];
}

export async function fetchLead(client: AmoClientOptions, leadId: number): Promise<AmoLead | null> {
  return amoFetch<AmoLead>(client, `/api/v4/leads/${leadId}`, {
    params: new URLSearchParams({ with: "contacts" }),
  });
}

/** Create leads together with their contact, one request for the batch. */
export async function createLeadsWithContacts(
  client: AmoClientOptions,
  leads: AmoLeadInput[]
): Promise<AmoComplexResult[]> {
  const response = await amoFetch<AmoComplexResult[]>(client, "/api/v4/leads/complex", {
    method: "POST",
    body: leads,
  });
  return response ?? [];
}

export async function updateLeads(client: AmoClientOptions, leads: AmoLeadInput[]): Promise<number[]> {
  const response = await amoFetch<AmoListResponse<{ leads?: { id: number }[] }>>(client, "/api/v4/leads", {
    method: "PATCH",
    body: leads,
  });
  return (response?._embedded?.leads ?? []).map((lead) => lead.id);
}

export async function updateContacts(client: AmoClientOptions, contacts: AmoContactInput[]): Promise<number[]> {
  const response = await amoFetch<AmoListResponse<{ contacts?: { id: number }[] }>>(client, "/api/v4/contacts", {
    method: "PATCH",
    body: contacts,
  });
  return (response?._embedded?.contacts ?? []).map((contact) => contact.id);
}
