import { describe, it, expect } from "vitest";
import { isCidr, isIp } from "./ipAddress.ts";

describe("isIp", () => {
  it("should accept IPv4 and IPv6 addresses", () => {
    expect(isIp("192.168.1.10")).toBe(true);
    expect(isIp("2001:db8::1")).toBe(true);
  });

  it("should reject invalid addresses", () => {
    expect(isIp("256.1.1.1")).toBe(false);
    expect(isIp("example.com")).toBe(false);
    expect(isIp("")).toBe(false);
  });

  it("should reject CIDR blocks", () => {
    expect(isIp("10.0.0.0/8")).toBe(false);
  });
});

describe("isCidr", () => {
  it("should accept prefix notation", () => {
    expect(isCidr("192.168.0.0/24")).toBe(true);
    expect(isCidr("10.0.0.1/32")).toBe(true);
    expect(isCidr("0.0.0.0/0")).toBe(true);
    expect(isCidr("2001:db8::/32")).toBe(true);
    expect(isCidr("::/128")).toBe(true);
  });

  it("should accept IPv4 netmask and hostmask notation", () => {
    expect(isCidr("10.0.0.1/255.255.0.0")).toBe(true);
    expect(isCidr("10.0.0.1/0.0.255.255")).toBe(true);
  });

  it("should reject non-contiguous masks", () => {
    expect(isCidr("10.0.0.1/255.0.255.0")).toBe(false);
  });

  it("should reject prefixes out of range", () => {
    expect(isCidr("10.0.0.1/33")).toBe(false);
    expect(isCidr("2001:db8::/129")).toBe(false);
  });

  it("should reject plain addresses", () => {
    expect(isCidr("10.0.0.1")).toBe(false);
    expect(isCidr("2001:db8::1")).toBe(false);
  });

  it("should reject malformed values", () => {
    expect(isCidr("not-an-ip/24")).toBe(false);
    expect(isCidr("10.0.0.1/")).toBe(false);
    expect(isCidr("10.0.0.1/24/8")).toBe(false);
    expect(isCidr("2001:db8::/ffff::")).toBe(false);
  });
});
