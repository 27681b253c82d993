import { describe, it, expect } from "vitest";
import { extractDateTag } from "./extract-date-tag";

describe("extractDateTag", () => {
  it("reads day-first numeric dates", () => {
    expect(extractDateTag("Invoice date: 15/01/2023")).toBe("2023/01");
    expect(extractDateTag("Datum 31.12.2022")).toBe("2022/12");
  });

  it("reads ISO dates", () => {
    expect(extractDateTag("Issued 2023-03-07, due 2023-04-07")).toBe("2023/03");
  });

  it("reads month names", () => {
    expect(extractDateTag("Statement for March 2024")).toBe("2024/03");
    expect(extractDateTag("statement for march 2024")).toBe("2024/03");
  });

  it("uses the earliest date in the text", () => {
    expect(extractDateTag("Paid on 02/05/2023 for invoice 2022-12-01")).toBe("2023/05");
  });

  it("skips impossible dates", () => {
    expect(extractDateTag("Ref 2023-13-40, dated 2023-02-01")).toBe("2023/02");
  });

  it("returns undefined without a date", () => {
    expect(extractDateTag("Order #12345, total 99.50")).toBeUndefined();
    expect(extractDateTag("")).toBeUndefined();
  });
});
