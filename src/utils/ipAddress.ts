import { isIP } from "net";

const DIGITS = /^\d+$/;

/**
 * Returns true for a valid IPv4 or IPv6 address without a prefix
 */
export function isIp(value: string): boolean {
  return isIP(value) !== 0;
}

function toBits(ipv4: string): string {
  return ipv4
    .split(".")
    .map((octet) => Number(octet).toString(2).padStart(8, "0"))
    .join("");
}

// Accepts both netmask (255.255.0.0) and hostmask (0.0.255.255) notation
function isIpv4Mask(value: string): boolean {
  if (isIP(value) !== 4) {
    return false;
  }
  const bits = toBits(value);
  return /^1*0*$/.test(bits) || /^0*1*$/.test(bits);
}

/**
 * Returns true for a valid CIDR block such as "10.0.0.0/8" or "2001:db8::/32".
 * A plain address is not a CIDR block.
 */
export function isCidr(value: string): boolean {
  const parts = value.split("/");
  if (parts.length !== 2) {
    return false;
  }

  const [address, suffix] = parts;
  const family = isIP(address);
  if (family === 0) {
    return false;
  }

  if (DIGITS.test(suffix)) {
    return Number(suffix) <= (family === 4 ? 32 : 128);
  }
  return family === 4 && isIpv4Mask(suffix);
}
