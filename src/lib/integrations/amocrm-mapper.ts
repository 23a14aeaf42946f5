import { fromUnixTime } from "date-fns";
import { normalizeEmail, normalizePhone } from "@/lib/sync/fingerprint";
import type { SyncRecord } from "@/lib/sync/types";
import type { AmoContact, AmoContactInput, AmoLead, AmoLeadInput } from "./amocrm";

export interface ContactFields {
  name: string;
  phone: string;
  email: string;
}

function firstValue(contact: AmoContact, fieldCode: "PHONE" | "EMAIL"): string {
  for (const field of contact.custom_fields_values ?? []) {
    if (field.field_code !== fieldCode) continue;
    const value = field.values?.[0]?.value;
    if (value !== undefined && value !== null && String(value).trim()) {
      return String(value).trim();
    }
  }
  return "";
}

export function contactFields(contact: AmoContact | undefined): ContactFields {
  if (!contact) return { name: "", phone: "", email: "" };
  return {
    name: (contact.name ?? "").trim(),
    phone: normalizePhone(firstValue(contact, "PHONE")),
    email: firstValue(contact, "EMAIL"),
  };
}

/**
 * Whether a contact found by search is the record's person: the search is
 * fuzzy, so the email or phone has to match exactly once normalized.
 */
export function contactMatches(contact: AmoContact, record: SyncRecord): boolean {
  const found = contactFields(contact);
  const email = normalizeEmail(record.email);
  const phone = normalizePhone(record.phone);
  return (email !== "" && normalizeEmail(found.email) === email) || (phone !== "" && found.phone === phone);
}

export function mainContactId(lead: AmoLead): number | undefined {
  const contacts = lead._embedded?.contacts ?? [];
  return (contacts.find((c) => c.is_main) ?? contacts[0])?.id;
}

export function leadToRecord(
  lead: AmoLead,
  contact: AmoContact | undefined,
  statusNames: Map<number, string>
): SyncRecord {
  const updatedAt = Math.max(lead.updated_at ?? 0, contact?.updated_at ?? 0);
  return {
    externalId: String(lead.id),
    ...contactFields(contact),
    dealFields: {
      budget: lead.price ?? 0,
      status: statusNames.get(lead.status_id) ?? String(lead.status_id),
    },
    lastModified: fromUnixTime(updatedAt),
    sourceOfTruth: "CRM",
  };
}

export function budgetOf(record: SyncRecord): number {
  const budget = record.dealFields.budget;
  if (typeof budget === "number" && Number.isFinite(budget) && budget > 0) {
    return Math.round(budget);
  }
  if (typeof budget === "string" && /^\d+$/.test(budget.trim())) {
    return parseInt(budget.trim(), 10);
  }
  return 0;
}

export function statusIdOf(record: SyncRecord, statusIds: Map<string, number>): number | undefined {
  const status = record.dealFields.status;
  return typeof status === "string" ? statusIds.get(status.trim().toLowerCase()) : undefined;
}

export function contactInput(record: SyncRecord, contactId?: number): AmoContactInput {
  const customFields: AmoContactInput["custom_fields_values"] = [];
  const phone = normalizePhone(record.phone);
  if (phone) {
    customFields.push({ field_code: "PHONE", values: [{ value: phone, enum_code: "WORK" }] });
  }
  if (record.email.trim()) {
    customFields.push({ field_code: "EMAIL", values: [{ value: record.email.trim(), enum_code: "WORK" }] });
  }
  return {
    ...(contactId !== undefined ? { id: contactId } : {}),
    name: record.name.trim() || record.email.trim() || phone,
    custom_fields_values: customFields,
  };
}

export interface LeadDefaults {
  pipelineId: number;
  statusId: number;
}

/** A lead with a new embedded contact, or attached to `existingContactId`. */
export function newLeadInput(
  record: SyncRecord,
  defaults: LeadDefaults,
  statusIds: Map<string, number>,
  existingContactId?: number
): AmoLeadInput {
  return {
    price: budgetOf(record),
    pipeline_id: defaults.pipelineId,
    status_id: statusIdOf(record, statusIds) ?? defaults.statusId,
    _embedded: { contacts: [existingContactId !== undefined ? { id: existingContactId } : contactInput(record)] },
  };
}

/** An unknown status name leaves the lead's status as it is. */
export function leadPatch(record: SyncRecord, leadId: number, statusIds: Map<string, number>): AmoLeadInput {
  const statusId = statusIdOf(record, statusIds);
  return {
    id: leadId,
    price: budgetOf(record),
    ...(statusId !== undefined ? { status_id: statusId } : {}),
  };
}
