import { describe, test, expect } from "vitest";
import { decodeBody, encode, parseFrame } from "../src/protocol/framing";

describe("framing", () => {
  test("encode produces valid Content-Length header", () => {
    const buf = encode({ jsonrpc: "2.0", id: 1, method: "test" });
    const str = buf.toString();
    expect(str.startsWith("Content-Length: ")).toBe(true);
    const [header, body] = str.split("\r\n\r\n");
    expect(header).toBe(`Content-Length: ${Buffer.byteLength(body ?? "")}`);
    expect(body).toBe('{"jsonrpc":"2.0","id":1,"method":"test"}');
  });

  test("encode counts bytes, not characters", () => {
    const buf = encode({ text: "héllo 🌍" });
    // {"text":"héllo 🌍"} is 19 UTF-16 units: é takes 2 bytes, 🌍 takes 4.
    expect(buf.toString().startsWith("Content-Length: 22\r\n\r\n")).toBe(true);
  });

  test("encode can omit headers", () => {
    const buf = encode({ id: 7 }, { sendOnlyBody: true });
    expect(buf.toString()).toBe('{"id":7}');
  });

  test("parseFrame splits headers from the body", () => {
    const frame = parseFrame(
      Buffer.from('Content-Length: 8\r\nContent-Type: application/json\r\n\r\n{"id":1}')
    );
    expect(frame.headers.get("content-length")).toBe("8");
    expect(frame.headers.get("content-type")).toBe("application/json");
    expect(frame.body.toString()).toBe('{"id":1}');
  });

  test("parseFrame treats a frame without headers as body", () => {
    const frame = parseFrame(Buffer.from('{"id":1}'));
    expect(frame.headers.size).toBe(0);
    expect(frame.body.toString()).toBe('{"id":1}');
  });

  test("decodeBody handles unicode correctly", () => {
    const original = { text: "こんにちは世界 🌍" };
    expect(JSON.parse(decodeBody(parseFrame(encode(original))))).toEqual(original);
  });

  test("decodeBody honors a declared charset", () => {
    const body = Buffer.from([0x22, 0x63, 0x61, 0x66, 0xe9, 0x22]); // "café" in latin1
    const frame = parseFrame(
      Buffer.concat([
        Buffer.from("Content-Length: 6\r\nContent-Type: application/vscode-jsonrpc; charset=iso-8859-1\r\n\r\n"),
        body,
      ])
    );
    expect(decodeBody(frame)).toBe('"café"');
  });
});
