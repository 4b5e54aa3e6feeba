import type { Environment } from "../../ports/environment"
import { DefaultRegistry, setting } from "../registry"
import { Settings } from "../settings"

describe("Settings", () => {
  let env: Environment
  let registry: DefaultRegistry
  let settings: Settings

  beforeEach(() => {
    env = {}
    registry = new DefaultRegistry()
    settings = new Settings({ env, registry })
  })

  describe("zero values", () => {
    it("returns each kind's zero value when nothing is set or registered", () => {
      expect(settings.getString("MISSING")).toBe("")
      expect(settings.getStringSlice("MISSING")).toEqual([])
      expect(settings.getInt("MISSING")).toBe(0)
      expect(settings.getInt64("MISSING")).toBe(0n)
      expect(settings.getFloat64("MISSING")).toBe(0)
      expect(settings.getBool("MISSING")).toBe(false)
      expect(settings.getDuration("MISSING")).toBe(0)
    })

    it("ignores a registered default of a different kind", () => {
      registry.register("DB_MAX", setting.string("six"))

      expect(settings.getInt("DB_MAX")).toBe(0)
      expect(settings.getDuration("DB_MAX")).toBe(0)
      expect(settings.getBool("DB_MAX")).toBe(false)
    })

    it("does not resolve Object.prototype members from the environment", () => {
      expect(settings.getString("toString")).toBe("")
      expect(settings.getInt("constructor")).toBe(0)
    })
  })

  describe("getString", () => {
    it("returns the variable as is", () => {
      env.APP_NAME = "  orders  "

      expect(settings.getString("APP_NAME")).toBe("  orders  ")
    })

    it("returns an empty variable rather than the default", () => {
      registry.register("APP_NAME", setting.string("orders"))
      env.APP_NAME = ""

      expect(settings.getString("APP_NAME")).toBe("")
    })

    it("falls back to the registered default", () => {
      registry.register("APP_NAME", setting.string("orders"))

      expect(settings.getString("APP_NAME")).toBe("orders")
    })
  })

  describe("getStringSlice", () => {
    it("splits on commas in order", () => {
      env.HOSTS = "a,b,c"

      expect(settings.getStringSlice("HOSTS")).toEqual(["a", "b", "c"])
    })

    it("returns a single element without commas", () => {
      env.HOSTS = "a"

      expect(settings.getStringSlice("HOSTS")).toEqual(["a"])
    })

    it("does not trim elements", () => {
      env.HOSTS = "a, b ,"

      expect(settings.getStringSlice("HOSTS")).toEqual(["a", " b ", ""])
    })

    it("returns a copy of the registered default", () => {
      registry.register("HOSTS", setting.stringList(["x", "y"]))

      const hosts = settings.getStringSlice("HOSTS")
      hosts.push("z")

      expect(settings.getStringSlice("HOSTS")).toEqual(["x", "y"])
    })
  })

  describe("getInt", () => {
    it("parses a base-10 integer", () => {
      env.MAX_CONNS = "10"

      expect(settings.getInt("MAX_CONNS")).toBe(10)
    })

    it("reads negative zero as zero", () => {
      env.MAX_CONNS = "-0"

      expect(settings.getInt("MAX_CONNS")).toBe(0)
    })

    it("falls through to the default when unparseable", () => {
      registry.register("MAX_CONNS", setting.int(4))
      env.MAX_CONNS = "abc"

      expect(settings.getInt("MAX_CONNS")).toBe(4)
    })

    it("falls through to zero when unparseable and unregistered", () => {
      env.MAX_CONNS = "abc"

      expect(settings.getInt("MAX_CONNS")).toBe(0)
    })
  })

  describe("getInt64", () => {
    it("parses values beyond the safe integer range", () => {
      env.MAX_BYTES = "9223372036854775807"

      expect(settings.getInt64("MAX_BYTES")).toBe(9223372036854775807n)
    })

    it("uses an int64 default", () => {
      registry.register("MAX_BYTES", setting.int64(1n << 40n))

      expect(settings.getInt64("MAX_BYTES")).toBe(1099511627776n)
    })

    it("widens an int default", () => {
      registry.register("MAX_BYTES", setting.int(1024))
      env.MAX_BYTES = "lots"

      expect(settings.getInt64("MAX_BYTES")).toBe(1024n)
    })
  })

  describe("getFloat64", () => {
    it("parses decimal and exponent notation", () => {
      env.RATIO = "0.75"
      env.SCALE = "2.5e3"

      expect(settings.getFloat64("RATIO")).toBe(0.75)
      expect(settings.getFloat64("SCALE")).toBe(2500)
    })

    it("falls through to the default when unparseable", () => {
      registry.register("RATIO", setting.float(0.5))
      env.RATIO = "three quarters"

      expect(settings.getFloat64("RATIO")).toBe(0.5)
    })
  })

  describe("getBool", () => {
    it.each(["TRUE", "true", "True"])("returns true for %j", (value) => {
      env.DEBUG = value

      expect(settings.getBool("DEBUG")).toBe(true)
    })

    it.each(["false", "yes", "1", ""])(
      "returns false for %j without consulting the default",
      (value) => {
        registry.register("DEBUG", setting.bool(true))
        env.DEBUG = value

        expect(settings.getBool("DEBUG")).toBe(false)
      },
    )

    it("uses the default only when the variable is unset", () => {
      registry.register("DEBUG", setting.bool(true))

      expect(settings.getBool("DEBUG")).toBe(true)
    })

    it("short-circuits where getInt falls through", () => {
      registry.register("FLAG", setting.bool(true))
      registry.register("COUNT", setting.int(3))
      env.FLAG = "garbage"
      env.COUNT = "garbage"

      expect(settings.getBool("FLAG")).toBe(false)
      expect(settings.getInt("COUNT")).toBe(3)
    })
  })

  describe("getDuration", () => {
    it("parses a duration expression", () => {
      env.HTTP_TIMEOUT = "1m30s"

      expect(settings.getDuration("HTTP_TIMEOUT")).toBe(90_000)
    })

    it("sums fractional segments without rounding error", () => {
      env.HTTP_TIMEOUT = "1.005s"

      expect(settings.getDuration("HTTP_TIMEOUT")).toBe(1_005)
    })

    it("falls through to the default when unparseable", () => {
      registry.register("HTTP_TIMEOUT", setting.duration(30_000))
      env.HTTP_TIMEOUT = "30"

      expect(settings.getDuration("HTTP_TIMEOUT")).toBe(30_000)
    })
  })

  describe("environment", () => {
    it("reads the environment on every call", () => {
      expect(settings.getInt("DB_MAX")).toBe(0)

      env.DB_MAX = "8"

      expect(settings.getInt("DB_MAX")).toBe(8)
    })

    it("treats undefined entries as unset", () => {
      registry.register("APP_NAME", setting.string("orders"))
      env.APP_NAME = undefined

      expect(settings.getString("APP_NAME")).toBe("orders")
    })

    it("creates its own registry when none is given", () => {
      const standalone = new Settings({ env: { PORT: "8080" } })

      expect(standalone.getInt("PORT")).toBe(8080)
      expect(standalone.registry.size).toBe(0)
    })
  })
})
