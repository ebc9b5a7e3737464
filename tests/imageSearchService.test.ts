import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildImageQuery,
  createImageSearchClient,
  toCandidates
} from "../services/imageSearchService.js";
import { testSettings } from "./helpers.js";

const { fetchMock } = vi.hoisted(() => ({ fetchMock: vi.fn() }));

vi.mock("node-fetch", () => ({ default: fetchMock }));

function jsonResponse(body: unknown, status = 200) {
  return { ok: status >= 200 && status < 300, status, json: async () => body };
}

const configured = { googleApiKey: "test-secret", googleCseId: "test-cse" };

describe("buildImageQuery", () => {
  it("adds the manufacturer when known", () => {
    expect(buildImageQuery("QO120", "Acme")).toBe("QO120 product Acme");
    expect(buildImageQuery("QO120")).toBe("QO120 product");
    expect(buildImageQuery("QO120", null)).toBe("QO120 product");
  });
});

describe("toCandidates", () => {
  it("keeps only items with a usable image link", () => {
    const images = toCandidates([
      { link: "x-raw-image:///abc" },
      { title: "No link" },
      { link: "data:image/png;base64,AAAA" },
      {
        title: "QO120 breaker",
        link: "https://cdn.example.com/qo120.jpg",
        image: {
          contextLink: "https://www.acme.com/qo120",
          thumbnailLink: "https://thumbs.example.com/qo120.jpg",
          width: 640,
          height: 480
        }
      },
      { link: "https://cdn.example.com/other.jpg", image: { contextLink: "not-a-url" } }
    ]);

    expect(images).toEqual([
      {
        title: "QO120 breaker",
        url: "https://cdn.example.com/qo120.jpg",
        sourceUrl: "https://www.acme.com/qo120",
        thumbnailUrl: "https://thumbs.example.com/qo120.jpg",
        width: 640,
        height: 480
      },
      {
        title: "Product Image",
        url: "https://cdn.example.com/other.jpg",
        sourceUrl: "",
        thumbnailUrl: "",
        width: 0,
        height: 0
      }
    ]);
  });
});

describe("createImageSearchClient", () => {
  beforeEach(() => {
    fetchMock.mockReset();
  });

  it("returns [] without credentials and makes no request", async () => {
    const client = createImageSearchClient(testSettings({ googleApiKey: "", googleCseId: "" }));

    expect(await client.search("QO120", "Acme")).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("queries Custom Search for photos of the part", async () => {
    fetchMock.mockResolvedValue(
      jsonResponse({ items: [{ link: "https://cdn.example.com/qo120.jpg" }] })
    );
    const client = createImageSearchClient(testSettings(configured));

    const images = await client.search("QO120", "Acme", "req-1");

    expect(images.map((image) => image.url)).toEqual(["https://cdn.example.com/qo120.jpg"]);
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.origin + url.pathname).toBe("https://www.googleapis.com/customsearch/v1");
    expect(url.searchParams.get("q")).toBe("QO120 product Acme");
    expect(url.searchParams.get("searchType")).toBe("image");
    expect(url.searchParams.get("cx")).toBe("test-cse");
    expect(url.searchParams.get("num")).toBe("10");
  });

  it("returns [] when the search fails", async () => {
    fetchMock.mockResolvedValue(jsonResponse({ error: "forbidden" }, 403));
    const client = createImageSearchClient(testSettings(configured));

    expect(await client.search("QO120")).toEqual([]);
  });

  it("returns [] for a response without items", async () => {
    fetchMock.mockResolvedValue(jsonResponse({}));
    const client = createImageSearchClient(testSettings(configured));

    expect(await client.search("QO120")).toEqual([]);
  });

  it("limits how many searches run at once", async () => {
    const pending: Array<() => void> = [];
    fetchMock.mockImplementation(
      () =>
        new Promise((resolve) => {
          pending.push(() => resolve(jsonResponse({ items: [] })));
        })
    );
    const client = createImageSearchClient(testSettings({ ...configured, imageSearchConcurrency: 1 }));

    const first = client.search("A1");
    const second = client.search("B2");

    await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(1));
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(fetchMock).toHaveBeenCalledTimes(1);

    pending[0]();
    await first;
    await vi.waitFor(() => expect(fetchMock).toHaveBeenCalledTimes(2));
    pending[1]();
    await second;
  });
});
