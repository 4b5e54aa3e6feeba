import { LoadResult } from "../load-result"

describe("LoadResult", () => {
  const provenance = new Map([
    ["DB_MAX", "dotenv:/srv/app/.env"],
    ["APP_NAME", "dotenv:/home/dev/.env"],
  ])
  const applied = ["dotenv:/home/dev/.env", "dotenv:/srv/app/.env"]

  const result = new LoadResult(provenance, applied)

  describe("explain", () => {
    it("returns the source that last assigned the key", () => {
      expect(result.explain("DB_MAX")).toBe("dotenv:/srv/app/.env")
      expect(result.explain("APP_NAME")).toBe("dotenv:/home/dev/.env")
    })

    it("returns undefined for keys no source assigned", () => {
      expect(result.explain("PATH")).toBeUndefined()
    })
  })

  describe("keys", () => {
    it("returns keys in first-assignment order", () => {
      expect(result.keys()).toEqual(["DB_MAX", "APP_NAME"])
    })
  })

  describe("sourcesUsed", () => {
    it("returns sources in the order they were applied", () => {
      expect(result.sourcesUsed()).toEqual(applied)
    })

    it("returns a fresh array on each call", () => {
      result.sourcesUsed().push("dotenv:/tmp/.env")

      expect(result.sourcesUsed()).toHaveLength(2)
    })
  })

  it("is not affected by later changes to its inputs", () => {
    const map = new Map([["A", "object:overrides"]])
    const list = ["object:overrides"]
    const snapshot = new LoadResult(map, list)

    map.set("B", "object:overrides")
    list.push("dotenv:/tmp/.env")

    expect(snapshot.keys()).toEqual(["A"])
    expect(snapshot.sourcesUsed()).toEqual(["object:overrides"])
  })

  it("reports nothing for an empty load", () => {
    const empty = new LoadResult(new Map(), [])

    expect(empty.keys()).toEqual([])
    expect(empty.sourcesUsed()).toEqual([])
    expect(empty.explain("DB_MAX")).toBeUndefined()
  })
})
