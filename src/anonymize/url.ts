import { isIP } from "node:net";
import { sha256Hex } from "../utils/hash.js";

const SCHEME_RE = /^([a-zA-Z][a-zA-Z0-9+.-]*:\/\/)(.*)$/s;
const PORT_RE = /^(.*):(\d+)$/s;
const HASH_LENGTH = 8;

/**
 * Deterministic one-way mapping of URLs, hostnames and addresses.
 *
 * Scheme, port and separators survive. Each host label or path segment is kept
 * if it appears in the vocabulary and otherwise replaced with a short SHA-256
 * prefix, so equal inputs give equal tokens in every process while the tokens
 * say nothing about the original text. IP literals and hosts with no
 * vocabulary label are hashed whole, never octet by octet.
 */
export class UrlAnonymizer {
  private readonly allowed: ReadonlySet<string>;

  constructor(vocabulary: Iterable<string>) {
    this.allowed = new Set([...vocabulary].map((w) => w.toLowerCase()));
  }

  anonymize(input: string): string {
    if (input === "") return "";

    let scheme = "";
    let rest = input;
    const schemeMatch = SCHEME_RE.exec(input);
    if (schemeMatch) {
      scheme = schemeMatch[1];
      rest = schemeMatch[2];
    }

    let tail = "";
    const tailStart = rest.search(/[?#]/);
    if (tailStart >= 0) {
      tail = rest.slice(tailStart);
      rest = rest.slice(0, tailStart);
    }

    const slash = rest.indexOf("/");
    const authority = slash >= 0 ? rest.slice(0, slash) : rest;
    const path = slash >= 0 ? rest.slice(slash) : "";

    return scheme + this.authority(authority) + this.path(path) + this.tail(tail);
  }

  isAllowed(word: string): boolean {
    return this.allowed.has(word.toLowerCase());
  }

  private token(word: string): string {
    if (word === "" || this.isAllowed(word)) return word;
    return digest(word);
  }

  private host(host: string): string {
    if (host === "") return "";
    if (isIP(host) !== 0) return digest(host);
    const labels = host.split(".");
    if (labels.some((label) => label !== "" && this.isAllowed(label))) {
      return labels.map((label) => this.token(label)).join(".");
    }
    const lead = host.startsWith(".") ? "." : "";
    const rest = host.slice(lead.length);
    return rest ? lead + digest(rest) : host;
  }

  private authority(authority: string): string {
    let userinfo = "";
    let hostPort = authority;
    const at = authority.lastIndexOf("@");
    if (at >= 0) {
      userinfo = digest(authority.slice(0, at)) + "@";
      hostPort = authority.slice(at + 1);
    }

    if (hostPort.startsWith("[")) {
      const close = hostPort.indexOf("]");
      if (close > 0) {
        const ipv6 = hostPort.slice(1, close);
        return userinfo + "[" + digest(ipv6) + "]" + hostPort.slice(close + 1);
      }
    }
    if (isIP(hostPort) === 6) return userinfo + digest(hostPort);

    let host = hostPort;
    let port = "";
    const portMatch = PORT_RE.exec(hostPort);
    if (portMatch && !portMatch[1].includes(":")) {
      host = portMatch[1];
      port = ":" + portMatch[2];
    }

    return userinfo + this.host(host) + port;
  }

  private path(path: string): string {
    if (!path) return "";
    return path.split("/").map((segment) => this.token(segment)).join("/");
  }

  private tail(tail: string): string {
    if (!tail) return "";
    const body = tail.slice(1);
    return tail[0] + (body ? digest(body) : "");
  }
}

function digest(text: string): string {
  return sha256Hex(text).slice(0, HASH_LENGTH);
}
