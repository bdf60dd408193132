import { describe, it, expect } from "vitest";
import { loadScanConfig, resolveExclusions } from "./config.js";
import { ConfigError } from "./errors.js";

describe("Scan Configuration", () => {
  describe("loadScanConfig", () => {
    it("should apply defaults", () => {
      const config = loadScanConfig({}, {});

      expect(config.regions).toBeUndefined();
      expect(config.excludeRegions).toEqual([]);
      expect(config.regionConcurrency).toBe(4);
      expect(config.vpcConcurrency).toBe(4);
      expect(config.maxAttempts).toBe(5);
      expect(config.metricsLookbackDays).toBe(3);
      expect(config.verbose).toBe(false);
      expect(config.homeRegion).toBe("us-east-1");
      expect(config.profile).toBeUndefined();
      expect(config.excluded.size).toBe(0);
    });

    it("should take the home region and profile from the environment", () => {
      const config = loadScanConfig({}, { AWS_REGION: "eu-west-1", AWS_PROFILE: "audit" });

      expect(config.homeRegion).toBe("eu-west-1");
      expect(config.profile).toBe("audit");
    });

    it("should prefer explicit values over the environment", () => {
      const config = loadScanConfig(
        { homeRegion: "ap-southeast-2", profile: "ops" },
        { AWS_REGION: "eu-west-1", AWS_PROFILE: "audit" },
      );

      expect(config.homeRegion).toBe("ap-southeast-2");
      expect(config.profile).toBe("ops");
    });

    it("should ignore a malformed environment region", () => {
      expect(loadScanConfig({}, { AWS_DEFAULT_REGION: "nowhere" }).homeRegion).toBe("us-east-1");
    });

    it("should resolve exclusion aliases", () => {
      const config = loadScanConfig({ exclude: ["s3", "network"] }, {});

      expect([...config.excluded]).toEqual([
        "s3_buckets",
        "subnets",
        "route_tables",
        "internet_gateways",
        "nat_gateways",
      ]);
    });

    it("should reject invalid regions", () => {
      expect(() => loadScanConfig({ regions: ["Mars-1"] }, {})).toThrow(ConfigError);
    });

    it("should reject out-of-range concurrency", () => {
      try {
        loadScanConfig({ regionConcurrency: 0 }, {});
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        expect(err instanceof ConfigError && err.issues[0]?.startsWith("regionConcurrency:")).toBe(true);
      }
    });
  });

  describe("resolveExclusions", () => {
    it("should accept tokens in any case and with hyphens", () => {
      expect(resolveExclusions(["EC2-Instances", "ebs"])).toEqual(["ec2_instances", "ebs_volumes"]);
    });

    it("should expand rds to both RDS tokens", () => {
      expect(resolveExclusions(["rds"])).toEqual(["rds_instances", "rds_clusters"]);
    });

    it("should skip blanks", () => {
      expect(resolveExclusions([" ", "sg"])).toEqual(["security_groups"]);
    });

    it("should reject unknown tokens", () => {
      expect(() => resolveExclusions(["lambda"])).toThrow("Unknown resource type(s): lambda");
    });
  });
});
