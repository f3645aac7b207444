import { strict as assert } from "assert";
import { UsedAuthorizations } from "./UsedAuthorizations";

describe("UsedAuthorizations", () => {
  it("should accept a message once", () => {
    const used = new UsedAuthorizations(1000, () => 5000);
    assert.equal(used.claim("message", 5000), true);
    assert.equal(used.claim("message", 5000), false);
    assert.equal(used.claim("other", 5000), true);
  });

  it("should forget messages once their window has passed", () => {
    let now = 5000;
    const used = new UsedAuthorizations(1000, () => now);
    used.claim("message", 5000);

    now = 6000;
    assert.equal(used.claim("message", 5000), false);

    now = 6001;
    assert.equal(used.claim("fresh", 6001), true);
    assert.equal(used.size, 1);
  });
});
