import { describe, it, expect } from "vitest";
import { createServiceRoleClient } from "./service";
import { TEST_ENV } from "./testFetch";

describe("createServiceRoleClient", () => {
  it("requires both the URL and the service role key", () => {
    const message = "Missing SUPABASE_URL and/or SUPABASE_SERVICE_ROLE_KEY for service role client";
    expect(() => createServiceRoleClient({})).toThrow(message);
    expect(() => createServiceRoleClient({ SUPABASE_URL: TEST_ENV.SUPABASE_URL })).toThrow(message);
    expect(() => createServiceRoleClient({ SUPABASE_SERVICE_ROLE_KEY: "test-secret" })).toThrow(message);
  });

  it("builds a client from the environment", () => {
    const client = createServiceRoleClient(TEST_ENV);
    expect(typeof client.from).toBe("function");
  });
});
