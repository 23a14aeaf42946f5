import { describe, expect, it } from "vitest";
import { makeRecord } from "@/test/fakes";
import type { AmoContact, AmoLead } from "./amocrm";
import {
  budgetOf,
  contactFields,
  contactInput,
  contactMatches,
  leadPatch,
  leadToRecord,
  mainContactId,
  newLeadInput,
} from "./amocrm-mapper";

const lead: AmoLead = {
  id: 1000,
  price: 5000,
  status_id: 11,
  pipeline_id: 1,
  updated_at: 1714564800,
  _embedded: { contacts: [{ id: 6 }, { id: 7, is_main: true }] },
};

const contact: AmoContact = {
  id: 7,
  name: " Ann ",
  updated_at: 1714568400,
  custom_fields_values: [
    { field_code: "PHONE", values: [{ value: "8 912 345-67-89", enum_code: "WORK" }] },
    { field_code: "EMAIL", values: [{ value: "ann@x.com", enum_code: "WORK" }] },
  ],
};

describe("leadToRecord", () => {
  it("combines the lead with its main contact", () => {
    expect(leadToRecord(lead, contact, new Map([[11, "New"]]))).toEqual({
      externalId: "1000",
      name: "Ann",
      phone: "79123456789",
      email: "ann@x.com",
      dealFields: { budget: 5000, status: "New" },
      lastModified: new Date(1714568400 * 1000),
      sourceOfTruth: "CRM",
    });
  });

  it("falls back to the status id and empty contact fields", () => {
    const record = leadToRecord({ ...lead, price: null }, undefined, new Map());

    expect(record.dealFields).toEqual({ budget: 0, status: "11" });
    expect([record.name, record.email, record.phone]).toEqual(["", "", ""]);
    expect(record.lastModified).toEqual(new Date(1714564800 * 1000));
  });
});

describe("contactFields", () => {
  it("skips empty values", () => {
    const fields = contactFields({
      id: 1,
      name: null,
      custom_fields_values: [
        { field_code: "EMAIL", values: [{ value: "  " }] },
        { field_code: "EMAIL", values: [{ value: "second@x.com" }] },
      ],
    });

    expect(fields).toEqual({ name: "", phone: "", email: "second@x.com" });
  });
});

describe("mainContactId", () => {
  it("prefers the main contact, then the first one", () => {
    expect(mainContactId(lead)).toBe(7);
    expect(mainContactId({ ...lead, _embedded: { contacts: [{ id: 6 }] } })).toBe(6);
    expect(mainContactId({ ...lead, _embedded: undefined })).toBeUndefined();
  });
});

describe("budgetOf", () => {
  it("accepts positive numbers and digit strings", () => {
    expect(budgetOf(makeRecord({ dealFields: { budget: 12.6 } }))).toBe(13);
    expect(budgetOf(makeRecord({ dealFields: { budget: " 300 " } }))).toBe(300);
    expect(budgetOf(makeRecord({ dealFields: { budget: -5 } }))).toBe(0);
    expect(budgetOf(makeRecord({ dealFields: { budget: null } }))).toBe(0);
  });
});

describe("write payloads", () => {
  const statusIds = new Map([["won", 142]]);

  it("builds a contact with normalized phone and a fallback name", () => {
    const record = makeRecord({ name: "", email: " a@x.com ", phone: "8 912 345 67 89" });

    expect(contactInput(record, 7)).toEqual({
      id: 7,
      name: "a@x.com",
      custom_fields_values: [
        { field_code: "PHONE", values: [{ value: "79123456789", enum_code: "WORK" }] },
        { field_code: "EMAIL", values: [{ value: "a@x.com", enum_code: "WORK" }] },
      ],
    });
  });

  it("maps a known status name and defaults the rest", () => {
    const defaults = { pipelineId: 1, statusId: 10 };

    expect(newLeadInput(makeRecord({ dealFields: { budget: 100, status: "Won" } }), defaults, statusIds)).toMatchObject({
      price: 100,
      pipeline_id: 1,
      status_id: 142,
    });
    expect(newLeadInput(makeRecord({ dealFields: { budget: 100, status: "Lost?" } }), defaults, statusIds).status_id).toBe(10);
  });

  it("leaves the status alone on update when the name is unknown", () => {
    const patch = leadPatch(makeRecord({ dealFields: { budget: 200, status: "Someday" } }), 1000, statusIds);

    expect(patch).toEqual({ id: 1000, price: 200 });
    expect(patch).not.toHaveProperty("status_id");
  });

  it("attaches an existing contact by id instead of embedding a new one", () => {
    const input = newLeadInput(makeRecord(), { pipelineId: 1, statusId: 10 }, statusIds, 7);

    expect(input._embedded).toEqual({ contacts: [{ id: 7 }] });
  });
});

describe("contactMatches", () => {
  it("accepts a contact with the same email or phone once normalized", () => {
    expect(contactMatches(contact, makeRecord({ email: " ANN@x.com", phone: "" }))).toBe(true);
    expect(contactMatches(contact, makeRecord({ email: "", phone: "+7 (912) 345 67 89" }))).toBe(true);
  });

  it("rejects near misses from the fuzzy search", () => {
    expect(contactMatches(contact, makeRecord({ email: "joann@x.com", phone: "" }))).toBe(false);
    expect(contactMatches(contact, makeRecord({ email: "", phone: "" }))).toBe(false);
  });
});
