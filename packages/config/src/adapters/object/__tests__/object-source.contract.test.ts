import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: () => new ObjectSource({ NUMBER_FALLBACK: "strict", LOG_PRETTY: true }),
  expectedValue: () => ({ NUMBER_FALLBACK: "strict", LOG_PRETTY: true }),
})

describe("ObjectSource", () => {
  it("uses a custom name when given", () => {
    expect(new ObjectSource({}, "object:tests").name).toBe("object:tests")
  })
})
