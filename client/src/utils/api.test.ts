import { uploadVoucher, voucherImageUrl } from "./api";

describe("api", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("builds a new preview URL when a voucher is replaced by a file with the same name and size", () => {
    const first = { fileName: "taxi.png", contentType: "image/png", size: 10, revision: 1 };
    const replaced = { ...first, revision: 4 };

    expect(voucherImageUrl(1, 2, first)).toBe("/api/session/groups/1/slots/2/image?v=1");
    expect(voucherImageUrl(1, 2, replaced)).toBe("/api/session/groups/1/slots/2/image?v=4");
  });

  it("surfaces the server error message", async () => {
    const fetchMock = vi.fn().mockResolvedValue(
      new Response(JSON.stringify({ error: "The file is empty" }), { status: 400 })
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(uploadVoucher(0, 1, new File([], "blank.png", { type: "image/png" }))).rejects.toThrow(
      "The file is empty"
    );
    expect(fetchMock).toHaveBeenCalledWith(
      "/api/session/groups/0/slots/1",
      expect.objectContaining({ method: "PUT" })
    );
  });
});
