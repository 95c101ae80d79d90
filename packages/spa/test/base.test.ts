import {describe, expect, test} from "vitest";
import {
	type ProxyContext,
	basename,
	getProxyContext,
	originalRequestPath,
} from "../src/index.js";

describe("getProxyContext", () => {
	test("should read forwarding headers case-insensitively", () => {
		const headers = new Headers({
			"x-forwarded-prefix": "/foo",
			"X-FORWARDED-URI": "/foo/bar",
		});

		expect(getProxyContext(headers)).toEqual({
			forwardedPrefix: "/foo",
			forwardedURI: "/foo/bar",
		});
	});

	test("should treat empty headers as absent", () => {
		const headers = new Headers({
			"X-Forwarded-Prefix": "",
			"X-Forwarded-Uri": "",
		});

		expect(getProxyContext(headers)).toEqual({});
		expect(getProxyContext(new Headers())).toEqual({});
	});
});

describe("originalRequestPath", () => {
	test.each<[string, ProxyContext, string]>([
		["/", {}, "/"],
		["/some/path", {}, "/some/path"],
		["/", {forwardedPrefix: "/"}, "/"],
		["/", {forwardedPrefix: "/prefix"}, "/prefix"],
		["/foo", {forwardedPrefix: "/prefix"}, "/prefix/foo"],
		["/foo", {forwardedPrefix: "prefix//"}, "/prefix/foo"],
	])("%s with prefix %o is %s", (path, proxy, expected) => {
		expect(originalRequestPath(path, proxy)).toBe(expected);
	});

	test.each<[string, ProxyContext, string]>([
		["/", {forwardedURI: "/"}, "/"],
		["/", {forwardedURI: "/prefix"}, "/prefix"],
		["/", {forwardedURI: "/prefix/./page/.."}, "/prefix"],
		["/", {forwardedURI: "http://foo.bar:12345/prefix"}, "/prefix"],
		["/", {forwardedURI: "http://foo.bar:12345/prefix/"}, "/prefix"],
		["/", {forwardedURI: "http://foo.bar/my%20app?q=1"}, "/my app"],
		["/page", {forwardedURI: "prefix/page"}, "/prefix/page"],
	])("%s with forwarded URI %o is %s", (path, proxy, expected) => {
		expect(originalRequestPath(path, proxy)).toBe(expected);
	});

	test("should prefer the forwarded prefix", () => {
		expect(
			originalRequestPath("/foo", {
				forwardedPrefix: "/prefix",
				forwardedURI: "/elsewhere/foo",
			}),
		).toBe("/prefix/foo");
	});

	test("should ignore unusable forwarded URIs", () => {
		expect(originalRequestPath("/foo", {forwardedURI: "http://[::1"})).toBe(
			"/foo",
		);
		expect(
			originalRequestPath("/foo", {forwardedURI: "http://foo.bar/%E0%A4%A"}),
		).toBe("/foo");
	});
});

describe("basename", () => {
	test.each<[string, ProxyContext, string]>([
		["/", {}, "/"],
		["/foo/bar", {}, "/"],
		["/", {forwardedPrefix: "/foo"}, "/foo/"],
		["/foo/bar", {forwardedPrefix: "/"}, "/"],
		["/foo/bar", {forwardedPrefix: "/foo"}, "/foo/"],
		["/foo/bar", {forwardedPrefix: "/foo/"}, "/foo/"],
		["/foo/bar", {forwardedPrefix: "/bar"}, "/bar/"],
		["/foo/bar", {forwardedPrefix: "/foo/bar/"}, "/foo/bar/"],
	])("%s with %o is %s", (path, proxy, expected) => {
		expect(basename(path, proxy)).toBe(expected);
	});

	test("should derive the base from a forwarded URI", () => {
		expect(
			basename("/app/some/route", {forwardedURI: "/proxy/app/some/route"}),
		).toBe("/proxy/");
		expect(
			basename("/", {forwardedURI: "https://example.com/proxy/"}),
		).toBe("/proxy/");
	});

	test("should fall back to the root when the request is no suffix", () => {
		expect(basename("/some/route", {forwardedURI: "/other/path"})).toBe("/");
	});
});
