import { describe, expect, it } from "vitest";

import { extractReleaseTags, parseReleaseTags } from "../src/domain/release-tags.js";

describe("release tag extraction", () => {
  it("finds resolution, edition and type in a scene release name", () => {
    expect(parseReleaseTags("Alpha.2001.1080p.EXTENDED.BluRay.x264-TEST")).toEqual({
      resolution: "1080p",
      edition: "extended",
      type: "bluray",
    });
  });

  it("orders tags by category regardless of position", () => {
    expect(extractReleaseTags("Alpha 2001 WEB-DL 720p")).toEqual(["720p", "web-dl"]);
  });

  it("keeps the first match of each category", () => {
    expect(extractReleaseTags("Alpha.2001.2160p.1080p.HDTV")).toEqual(["2160p", "hdtv"]);
  });

  it("does not read TS out of other words", () => {
    expect(extractReleaseTags("Alpha.2001.TSC.Cuts.DVDRip")).toEqual(["dvdrip"]);
    expect(extractReleaseTags("Alpha.2001.TS.XviD")).toEqual(["ts"]);
  });

  it("returns nothing for names without tags", () => {
    expect(extractReleaseTags("Alpha 2001")).toEqual([]);
  });
});
