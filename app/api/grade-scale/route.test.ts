import { describe, expect, it } from "vitest";
import { GET } from "@/app/api/grade-scale/route";

describe("GET /api/grade-scale", () => {
  it("returns the active scale and where it came from", async () => {
    const res = await GET();
    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      source: "default",
      scaleMax: 4,
      config: { gradePoints: { A: 4, "B+": 3.3 }, percentileMethod: "spread" },
    });
  });
});
