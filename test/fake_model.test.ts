import { describe, it, expect } from "vitest";

import { FakeGenerativeModel, fakeModelReply } from "../src/providers/fake_model";

describe("FakeGenerativeModel", () => {
  it("answers the latest user text with plain text", async () => {
    const model = new FakeGenerativeModel({ label: "claims_identification", model: "fake" });

    const response = await model.generateContent({
      contents: [
        { role: "user", parts: [{ text: "first" }] },
        { role: "model", parts: [{ text: "reply" }] },
        { role: "user", parts: [{ text: "hello there" }] },
      ],
    });

    expect(response.candidates[0]?.content.parts).toEqual([
      { text: "[claims_identification] Stub response: I received 11 chars." },
    ]);
  });

  it("reports zero chars when the turn has no text", () => {
    expect(fakeModelReply({ userText: "", label: "output_response" })).toBe(
      "[output_response] Stub response: I received 0 chars."
    );
  });
});
