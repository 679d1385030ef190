import { describe, expect, it } from "vitest";

import { encodeSharingToken } from "../src/clients/sharing-token.js";

describe("encodeSharingToken", () => {
  it("encodes URLs with spaces as unpadded base64url", () => {
    expect(encodeSharingToken("https://contoso.sharepoint.com/sites/finance/Shared Documents/Q1 report.xlsx")).toBe(
      "u!aHR0cHM6Ly9jb250b3NvLnNoYXJlcG9pbnQuY29tL3NpdGVzL2ZpbmFuY2UvU2hhcmVkIERvY3VtZW50cy9RMSByZXBvcnQueGxzeA",
    );
  });

  it("drops the padding a standard base64 encoding would add", () => {
    const token = encodeSharingToken("https://contoso.sharepoint.com/sites/ops/plan.docx");

    expect(token).toBe("u!aHR0cHM6Ly9jb250b3NvLnNoYXJlcG9pbnQuY29tL3NpdGVzL29wcy9wbGFuLmRvY3g");
    expect(token).not.toContain("=");
  });
});
