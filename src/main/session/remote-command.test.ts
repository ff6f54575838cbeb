import { describe, expect, it } from "vitest";

import { buildCopyCommand } from "./remote-command.js";

describe("buildCopyCommand", () => {
  it("starts the remote side as a source for downloads", () => {
    expect(buildCopyCommand("scp", "source", "/srv/docs", false)).toBe('scp -rf "/srv/docs"');
  });

  it("starts the remote side as a sink for uploads", () => {
    expect(buildCopyCommand("scp", "sink", "/var/www", false)).toBe('scp -rt "/var/www"');
    expect(buildCopyCommand("scp", "sink", "/var/www", true)).toBe('scp -rpt "/var/www"');
  });

  it("quotes paths with spaces and quotes", () => {
    expect(buildCopyCommand("scp", "source", 'my "docs" dir', false)).toBe(
      'scp -rf "my \\"docs\\" dir"'
    );
  });
});
