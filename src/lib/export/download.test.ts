import { afterEach, describe, expect, it, vi } from "vitest";

import { downloadWorkbook } from "./download";

describe("downloadWorkbook", () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
  });

  it("clicks a link to the blob and revokes it after the click has been handled", () => {
    vi.useFakeTimers();
    const anchor = { href: "", download: "", click: vi.fn() };
    vi.stubGlobal("document", { createElement: vi.fn(() => anchor) });
    const create = vi.spyOn(URL, "createObjectURL").mockReturnValue("blob:workbook");
    const revoke = vi.spyOn(URL, "revokeObjectURL").mockImplementation(() => undefined);

    downloadWorkbook(new ArrayBuffer(4), "Earnings_Projection.xlsx");

    expect(create).toHaveBeenCalledTimes(1);
    expect(anchor.href).toBe("blob:workbook");
    expect(anchor.download).toBe("Earnings_Projection.xlsx");
    expect(anchor.click).toHaveBeenCalledTimes(1);
    expect(revoke).not.toHaveBeenCalled();

    vi.runAllTimers();

    expect(revoke).toHaveBeenCalledWith("blob:workbook");
  });
});
