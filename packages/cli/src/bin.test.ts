import { TranslationError } from "@vgpu/compiler";
import { expect } from "chai";

import { formatCliError, parseCommand } from "./bin.js";

describe("@vgpu/cli command parser", () => {
  it("classifies supported commands", () => {
    expect(parseCommand(["translate"])).to.equal("translate");
    expect(parseCommand(["translate", "--verbose", "k.json"])).to.equal("translate");
    expect(parseCommand(["help"])).to.equal("help");
  });

  it("classifies missing and unknown commands as help", () => {
    expect(parseCommand([])).to.equal("help");
    expect(parseCommand(["build"])).to.equal("help");
  });

  it("formats translation errors with their code and site", () => {
    const err = new TranslationError("VIR1002", "Source register r7 used without declaration.", {
      kernel: "k",
      instruction: "add.s32 %r0, %r7, 1",
    });
    expect(formatCliError(err)).to.equal(
      "VIR1002: Source register r7 used without declaration. (kernel 'k' at 'add.s32 %r0, %r7, 1')"
    );
    expect(formatCliError(new Error("vgpu.json: 'input' must be a non-empty string."))).to.equal(
      "vgpu.json: 'input' must be a non-empty string."
    );
    expect(formatCliError("plain")).to.equal("plain");
  });
});
