import { describe, it, expect } from "vitest";
import { createSupabaseNewsEventsStore, toClassificationUpdate, type ClassificationUpdate } from "./newsEventsStore";
import { createServiceRoleClient } from "./supabase/service";
import { createFakeFetch, TEST_ENV, type FakeResponse, type RecordedRequest } from "./supabase/testFetch";

function storeWith(handler: (req: RecordedRequest) => FakeResponse) {
  const fake = createFakeFetch(handler);
  const client = createServiceRoleClient(TEST_ENV, { fetch: fake.fetch });
  return { store: createSupabaseNewsEventsStore(client), requests: fake.requests };
}

const update: ClassificationUpdate = {
  vendor_primary: "TSMC",
  vendor_matches: "TSMC",
  risk_primary: "vendor",
  risk_score: 2,
  category_scores: { geopolitical: 0, vendor: 2 },
  classified_at: "2025-06-30T12:00:00.000Z",
};

describe("toClassificationUpdate", () => {
  it("flattens a classification into the derived columns", () => {
    const update = toClassificationUpdate(
      {
        matched_entities: [
          { name: "ASML", aliases: [] },
          { name: "TSMC", aliases: ["Taiwan Semiconductor"] },
        ],
        category_scores: { geopolitical: 5, vendor: 4 },
        primary_entity: { name: "ASML", aliases: [] },
        primary_category: "geopolitical",
        primary_score: 5,
      },
      "2025-06-30T12:00:00.000Z"
    );
    expect(update).toEqual({
      vendor_primary: "ASML",
      vendor_matches: "ASML, TSMC",
      risk_primary: "geopolitical",
      risk_score: 5,
      category_scores: { geopolitical: 5, vendor: 4 },
      classified_at: "2025-06-30T12:00:00.000Z",
    });
  });

  it("writes empty derived fields for an unclassified record", () => {
    const scores = { geopolitical: 0 };
    const update = toClassificationUpdate(
      {
        matched_entities: [],
        category_scores: scores,
        primary_entity: null,
        primary_category: "unclassified",
        primary_score: 0,
      },
      "2025-06-30T12:00:00.000Z"
    );
    expect(update.vendor_primary).toBeNull();
    expect(update.vendor_matches).toBe("");
    expect(update.category_scores).not.toBe(scores);
  });
});

describe("createSupabaseNewsEventsStore", () => {
  it("pages through news_events ordered by hash_id", async () => {
    const { store, requests } = storeWith(() => ({
      status: 200,
      body: [{ hash_id: "r1", title: "TSMC shipments rise", summary: null }],
    }));
    const rows = await store.listNewsEvents({ offset: 500, limit: 500 });

    expect(rows).toEqual([{ hash_id: "r1", title: "TSMC shipments rise", summary: null }]);
    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe("GET");
    expect(requests[0].path).toBe("/rest/v1/news_events");
    expect(requests[0].params.get("select")).toBe("hash_id,title,summary");
    expect(requests[0].params.get("order")).toBe("hash_id.asc");
    expect(requests[0].params.get("offset")).toBe("500");
    expect(requests[0].params.get("limit")).toBe("500");
  });

  it("rejects rows of an unexpected shape", async () => {
    const { store } = storeWith(() => ({ status: 200, body: [{ hash_id: 7 }] }));
    await expect(store.listNewsEvents({ offset: 0, limit: 10 })).rejects.toThrow(/^Unexpected news_events row shape/);
  });

  it("surfaces query errors", async () => {
    const { store } = storeWith(() => ({ status: 403, body: { message: "permission denied", code: "42501" } }));
    await expect(store.listNewsEvents({ offset: 0, limit: 10 })).rejects.toThrow(
      "Fetch news_events failed: permission denied"
    );
  });

  it("writes every derived field in one update for the record", async () => {
    const { store, requests } = storeWith(() => ({ status: 204 }));
    await store.saveClassification("r3", update);

    expect(requests).toHaveLength(1);
    expect(requests[0].method).toBe("PATCH");
    expect(requests[0].params.get("hash_id")).toBe("eq.r3");
    expect(requests[0].body).toEqual(update);
  });

  it("throws when the update fails", async () => {
    const { store } = storeWith(() => ({ status: 500, body: { message: "timeout" } }));
    await expect(store.saveClassification("r3", update)).rejects.toThrow("Update news_events r3 failed: timeout");
  });
});
