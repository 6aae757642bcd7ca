import { describe, it, expect } from "vitest"
import { decodeParquet, encodeParquet, inferColumnType } from "../../src/codec/parquet.js"

describe("inferColumnType", () => {
  it("treats numeric strings and numbers as DOUBLE", () => {
    expect(inferColumnType(["1", "2.5", null])).toBe("DOUBLE")
    expect(inferColumnType(["-3e5", 7])).toBe("DOUBLE")
  })

  it("treats true/false as BOOLEAN", () => {
    expect(inferColumnType(["true", "false", null])).toBe("BOOLEAN")
    expect(inferColumnType([true])).toBe("BOOLEAN")
  })

  it("falls back to STRING for mixed or empty columns", () => {
    expect(inferColumnType(["1", "London"])).toBe("STRING")
    expect(inferColumnType([null, null])).toBe("STRING")
    expect(inferColumnType([])).toBe("STRING")
  })

  it("keeps zero-prefixed identifiers as STRING", () => {
    expect(inferColumnType(["0123", "4567"])).toBe("STRING")
    expect(inferColumnType(["0", "0.5", "-0.25"])).toBe("DOUBLE")
  })

  it("keeps values that overflow a double as STRING", () => {
    expect(inferColumnType(["1e999"])).toBe("STRING")
    expect(inferColumnType([Number.POSITIVE_INFINITY])).toBe("STRING")
  })
})

describe("encodeParquet / decodeParquet", () => {
  it("keeps every row and column, typing values by column", async () => {
    const buffer = encodeParquet({
      columns: ["download", "ping", "server_name", "is_ok", "share"],
      rows: [
        { download: "100", ping: "14", server_name: "London", is_ok: "true", share: null },
        { download: "200.5", ping: null, server_name: "Leeds", is_ok: "false", share: null },
      ],
    })

    const table = await decodeParquet(buffer)

    expect(table.columns).toEqual(["download", "ping", "server_name", "is_ok", "share"])
    expect(table.rows).toEqual([
      { download: 100, ping: 14, server_name: "London", is_ok: true, share: null },
      { download: 200.5, ping: null, server_name: "Leeds", is_ok: false, share: null },
    ])
  })

  it("fills columns missing from a row with null", async () => {
    const buffer = encodeParquet({
      columns: ["a", "b"],
      rows: [{ a: "x" }, { a: "y", b: "z" }],
    })

    const table = await decodeParquet(buffer)

    expect(table.rows).toEqual([
      { a: "x", b: null },
      { a: "y", b: "z" },
    ])
  })

  it("writes a column that is null in every row", async () => {
    const buffer = encodeParquet({
      columns: ["download", "share"],
      rows: [
        { download: "100", share: null },
        { download: "120", share: null },
      ],
    })

    const table = await decodeParquet(buffer)

    expect(table.columns).toEqual(["download", "share"])
    expect(table.rows).toEqual([
      { download: 100, share: null },
      { download: 120, share: null },
    ])
  })

  it("keeps whole numbers beyond the 32-bit range", async () => {
    const buffer = encodeParquet({
      columns: ["bytes_received"],
      rows: [{ bytes_received: "3000000000" }, { bytes_received: "117000000" }],
    })

    const table = await decodeParquet(buffer)

    expect(table.rows).toEqual([{ bytes_received: 3000000000 }, { bytes_received: 117000000 }])
  })

  it("keeps zero-prefixed and out-of-range values verbatim", async () => {
    const buffer = encodeParquet({
      columns: ["server_id", "weird"],
      rows: [{ server_id: "0123", weird: "1e999" }],
    })

    const table = await decodeParquet(buffer)

    expect(table.rows).toEqual([{ server_id: "0123", weird: "1e999" }])
  })
})
