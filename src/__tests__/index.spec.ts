import { CliUsageError, parseArgs } from "../index";

describe("parseArgs", () => {
  it("takes the sitemap URL as the positional argument", () => {
    expect(parseArgs(["https://example.com/sitemap.xml"])).toEqual({
      help: false,
      sitemapUrl: "https://example.com/sitemap.xml",
    });
  });

  it("accepts options with separate or inline values", () => {
    const args = parseArgs([
      "--threads",
      "4",
      "https://example.com/sitemap.xml",
      "--output=out",
      "--timeout",
      "5",
      "--save-files",
    ]);

    expect(args).toEqual({
      help: false,
      sitemapUrl: "https://example.com/sitemap.xml",
      concurrency: 4,
      outputDir: "out",
      timeout: 5000,
      saveFiles: true,
    });
  });

  it("reads an explicit boolean for --save-files", () => {
    expect(parseArgs(["--save-files=false"]).saveFiles).toBe(false);
    expect(parseArgs(["--save-files=true"]).saveFiles).toBe(true);
  });

  it("compiles the filter pattern", () => {
    const args = parseArgs(["--filter=blog"]);
    expect(args.filter).toBeInstanceOf(RegExp);
    expect(args.filter?.source).toBe("blog");
  });

  it("accepts the largest timeout a timer can hold", () => {
    expect(parseArgs(["--timeout=2147483"]).timeout).toBe(2_147_483_000);
  });

  it("recognises help flags", () => {
    expect(parseArgs(["-h"]).help).toBe(true);
    expect(parseArgs(["--help"]).help).toBe(true);
  });

  it.each<[string[], string]>([
    [["--threads=0"], "--threads expects a positive integer, got \"0\""],
    [["--threads", "many"], "--threads expects a positive integer, got \"many\""],
    [["--timeout=-1"], "--timeout expects a positive integer, got \"-1\""],
    [["--timeout=2147484"], "--timeout must be at most 2147483 seconds, got 2147484"],
    [["--verbose"], "Unknown option --verbose"],
    [["--output"], "Missing value for --output"],
    [["--save-files=yes"], "--save-files expects true or false, got \"yes\""],
    [["https://a.example/s.xml", "https://b.example/s.xml"], "Unexpected argument \"https://b.example/s.xml\""],
  ])("rejects %j", (argv, message) => {
    expect(() => parseArgs(argv)).toThrow(new CliUsageError(message));
  });

  it("rejects an invalid filter pattern", () => {
    expect(() => parseArgs(["--filter=("])).toThrow(CliUsageError);
  });
});
