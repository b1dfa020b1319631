import { describe, expect, it } from "vitest";
import { browserCandidates, resolveBrowser } from "./browser";

function only(...present: string[]) {
  return (candidate: string) => present.includes(candidate);
}

describe("resolveBrowser", () => {
  it("prefers Brave when asked", () => {
    expect(resolveBrowser("brave", "linux", {}, only("/usr/bin/brave", "/usr/bin/google-chrome"))).toEqual({
      kind: "brave",
      path: "/usr/bin/brave",
    });
  });

  it("falls back to Chrome when Brave is missing", () => {
    expect(resolveBrowser("brave", "linux", {}, only("/usr/bin/chromium"))).toEqual({
      kind: "chrome",
      path: "/usr/bin/chromium",
    });
  });

  it("skips Brave when Chrome is requested", () => {
    expect(resolveBrowser("chrome", "darwin", {}, only(
      "/Applications/Brave Browser.app/Contents/MacOS/Brave Browser",
      "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome"
    ))).toEqual({
      kind: "chrome",
      path: "/Applications/Google Chrome.app/Contents/MacOS/Google Chrome",
    });
  });

  it("honours CHROME_PATH", () => {
    expect(resolveBrowser("brave", "linux", { CHROME_PATH: "/opt/chrome/chrome" }, () => true)).toEqual({
      kind: "brave",
      path: "/opt/chrome/chrome",
    });
  });

  it("returns null when nothing is installed", () => {
    expect(resolveBrowser("brave", "linux", {}, () => false)).toBeNull();
  });
});

describe("browserCandidates", () => {
  it("looks in both Program Files directories on Windows", () => {
    expect(browserCandidates("chrome", "win32", { PROGRAMFILES: "D:\\Apps" })).toEqual([
      "D:\\Apps\\Google\\Chrome\\Application\\chrome.exe",
      "C:\\Program Files (x86)\\Google\\Chrome\\Application\\chrome.exe",
    ]);
  });

  it("has no candidates on unknown platforms", () => {
    expect(browserCandidates("brave", "aix", {})).toEqual([]);
  });
});
