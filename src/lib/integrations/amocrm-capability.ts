import { CapabilityContractError } from "@/lib/errors";
import type { RateLimiter } from "@/lib/sync/rate-limiter";
import type {
  Batch,
  CredentialProvider,
  CrmCapability,
  CrmFilter,
  SyncRecord,
  WriteResult,
} from "@/lib/sync/types";
import {
  createLeadsWithContacts,
  fetchContactsByIds,
  fetchLead,
  fetchLeads,
  fetchStatuses,
  searchContacts,
  updateContacts,
  updateLeads,
  type AmoClientOptions,
  type AmoComplexResult,
  type AmoContactInput,
  type AmoLead,
  type AmoLeadInput,
} from "./amocrm";
import { normalizeEmail, normalizePhone } from "@/lib/sync/fingerprint";
import {
  contactInput,
  contactMatches,
  leadPatch,
  leadToRecord,
  mainContactId,
  newLeadInput,
} from "./amocrm-mapper";
import { batchFailure, withRetry } from "./http";

export interface AmoCrmCapabilityOptions {
  baseUrl: string;
  pipelineId: number;
  /** Status given to leads created from sheet rows without a known status. */
  statusId: number;
  credentials: CredentialProvider;
  /** Gates reads; writes are gated per batch by the sync engine. */
  limiter?: RateLimiter;
  timeoutMs?: number;
}

export class AmoCrmCapability implements CrmCapability {
  private readonly contactByLead = new Map<number, number>();
  private statusIds: Map<string, number> | null = null;

  constructor(private readonly options: AmoCrmCapabilityOptions) {}

  private async client(): Promise<AmoClientOptions> {
    const token = await this.options.credentials.getToken("CRM");
    return { baseUrl: this.options.baseUrl, token, timeoutMs: this.options.timeoutMs };
  }

  private readonly gate = async () => {
    await this.options.limiter?.acquire("CRM");
  };

  private async loadStatuses(client: AmoClientOptions, pipelineId: number): Promise<Map<number, string>> {
    const statuses = await withRetry(async () => {
      await this.gate();
      return fetchStatuses(client, pipelineId);
    });
    const names = new Map<number, string>();
    const ids = new Map<string, number>();
    for (const status of statuses) {
      names.set(status.id, status.name);
      ids.set(status.name.trim().toLowerCase(), status.id);
    }
    if (pipelineId === this.options.pipelineId) {
      this.statusIds = ids;
    }
    return names;
  }

  async read(filter: CrmFilter): Promise<SyncRecord[]> {
    const client = await this.client();
    const statusNames = await this.loadStatuses(client, filter.pipelineId);

    const leads: AmoLead[] = [];
    for await (const page of fetchLeads(client, filter.pipelineId, this.gate)) {
      leads.push(...page);
    }

    const contactIds: number[] = [];
    for (const lead of leads) {
      const contactId = mainContactId(lead);
      if (contactId !== undefined) {
        contactIds.push(contactId);
        this.contactByLead.set(lead.id, contactId);
      }
    }

    const contacts = await withRetry(() => fetchContactsByIds(client, contactIds, this.gate));

    return leads.map((lead) => {
      const contactId = mainContactId(lead);
      return leadToRecord(lead, contactId === undefined ? undefined : contacts.get(contactId), statusNames);
    });
  }

  async writeBatch(batch: Batch): Promise<WriteResult[]> {
    if (batch.backend !== "CRM") {
      throw new CapabilityContractError("CRM", `AmoCRM capability got a ${batch.backend} batch`);
    }
    if (batch.records.length === 0) return [];

    const client = await this.client();
    if (!this.statusIds) {
      await this.loadStatuses(client, this.options.pipelineId);
    }
    const statusIds = this.statusIds ?? new Map<string, number>();

    return batch.kind === "create"
      ? this.create(client, batch.records, statusIds)
      : this.update(client, batch.records, statusIds);
  }

  /** A contact already in the CRM for this person, by email first, then phone. */
  private async existingContactId(client: AmoClientOptions, record: SyncRecord): Promise<number | undefined> {
    for (const query of [normalizeEmail(record.email), normalizePhone(record.phone)]) {
      if (!query) continue;
      await this.gate();
      const found = (await searchContacts(client, query)).find((contact) => contactMatches(contact, record));
      if (found) return found.id;
    }
    return undefined;
  }

  private async create(
    client: AmoClientOptions,
    records: SyncRecord[],
    statusIds: Map<string, number>
  ): Promise<WriteResult[]> {
    const defaults = { pipelineId: this.options.pipelineId, statusId: this.options.statusId };

    let created: AmoComplexResult[];
    try {
      const leads: AmoLeadInput[] = [];
      for (const record of records) {
        leads.push(newLeadInput(record, defaults, statusIds, await this.existingContactId(client, record)));
      }
      created = await createLeadsWithContacts(client, leads);
    } catch (err) {
      return batchFailure(err, records.length);
    }

    if (created.length !== records.length) {
      throw new CapabilityContractError(
        "CRM",
        `AmoCRM created ${created.length} leads for a batch of ${records.length}`
      );
    }

    return created.map((result): WriteResult => {
      if (result.contact_id !== null) {
        this.contactByLead.set(result.id, result.contact_id);
      }
      return { ok: true, id: String(result.id) };
    });
  }

  private async contactIdFor(client: AmoClientOptions, leadId: number): Promise<number | undefined> {
    const cached = this.contactByLead.get(leadId);
    if (cached !== undefined) return cached;

    await this.gate();
    const lead = await fetchLead(client, leadId);
    const contactId = lead ? mainContactId(lead) : undefined;
    if (contactId !== undefined) this.contactByLead.set(leadId, contactId);
    return contactId;
  }

  private async update(
    client: AmoClientOptions,
    records: SyncRecord[],
    statusIds: Map<string, number>
  ): Promise<WriteResult[]> {
    const leadIds = records.map((record) => Number(record.externalId));

    const results: (WriteResult | null)[] = leadIds.map((id): WriteResult | null =>
      Number.isInteger(id) && id > 0
        ? null
        : { ok: false, kind: "REJECTED", message: "CRM update needs a lead id" }
    );

    const leadPatches: AmoLeadInput[] = [];
    const contactPatches: AmoContactInput[] = [];
    const writable = results.flatMap((result, i) => (result === null ? [i] : []));

    try {
      for (const i of writable) {
        leadPatches.push(leadPatch(records[i], leadIds[i], statusIds));
        const contactId = await this.contactIdFor(client, leadIds[i]);
        if (contactId !== undefined) {
          contactPatches.push(contactInput(records[i], contactId));
        }
      }

      if (leadPatches.length > 0) {
        await updateLeads(client, leadPatches);
      }
      if (contactPatches.length > 0) {
        await updateContacts(client, contactPatches);
      }
    } catch (err) {
      const failures = batchFailure(err, writable.length);
      writable.forEach((index, n) => {
        results[index] = failures[n];
      });
    }

    return results.map((result, i): WriteResult => result ?? { ok: true, id: String(leadIds[i]) });
  }
}
