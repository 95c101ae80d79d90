import {describe, expect, test} from "vitest";
import {MemoryFileSystemBackend} from "@spaserve/filesystem";
import {SPAHandler} from "../src/index.js";
import {type Handler, createServer} from "../src/node.js";

async function withServer(
	handler: Handler,
	run: (url: string) => Promise<void>,
): Promise<void> {
	const server = createServer(handler, {port: 0, host: "127.0.0.1"});
	await server.listen();
	try {
		await run(server.url);
	} finally {
		await server.close();
	}
}

describe("createServer", () => {
	const spa = new SPAHandler(
		new MemoryFileSystemBackend({
			"index.html": '<base href="/" />',
			"static/js/some.js": "CANARY JS",
		}),
		"index.html",
	);
	const handler: Handler = (request) => spa.fetch(request);

	test("should not listen before listen()", () => {
		const server = createServer(handler, {port: 0, host: "127.0.0.1"});
		expect(server.ready).toBe(false);
		expect(server.address()).toEqual({port: 0, host: "127.0.0.1"});
	});

	test("should report the actual port once listening", async () => {
		const server = createServer(handler, {port: 0, host: "127.0.0.1"});
		await server.listen();
		try {
			expect(server.ready).toBe(true);
			expect(server.address().port).toBeGreaterThan(0);
			expect(server.url).toBe(`http://127.0.0.1:${server.address().port}`);
		} finally {
			await server.close();
		}
		expect(server.ready).toBe(false);
	});

	test("should serve static assets", async () => {
		await withServer(handler, async (url) => {
			const response = await fetch(`${url}/static/js/some.js`);
			expect(response.status).toBe(200);
			expect(await response.text()).toBe("CANARY JS");
		});
	});

	test("should pass forwarding headers through", async () => {
		await withServer(handler, async (url) => {
			const response = await fetch(`${url}/bar/baz`, {
				headers: {"X-Forwarded-Prefix": "/foo"},
			});
			expect(response.status).toBe(200);
			expect(await response.text()).toBe('<base href="/foo/" />');
		});
	});

	test("should pass request bodies through", async () => {
		const echo: Handler = async (request) =>
			new Response(`${request.method} ${await request.text()}`);

		await withServer(echo, async (url) => {
			const response = await fetch(`${url}/echo`, {
				method: "POST",
				body: "test data",
			});
			expect(await response.text()).toBe("POST test data");
		});
	});

	test("should stream response bodies", async () => {
		const encoder = new TextEncoder();
		const streaming: Handler = async () =>
			new Response(
				new ReadableStream({
					start(controller) {
						controller.enqueue(encoder.encode("chunk1"));
						controller.enqueue(encoder.encode("chunk2"));
						controller.close();
					},
				}),
			);

		await withServer(streaming, async (url) => {
			const response = await fetch(`${url}/stream`);
			expect(await response.text()).toBe("chunk1chunk2");
		});
	});

	test("should answer handler failures with a generic 500", async () => {
		const failing: Handler = async () => {
			throw new Error("Handler error at /srv/www");
		};

		await withServer(failing, async (url) => {
			const response = await fetch(`${url}/test`);
			expect(response.status).toBe(500);
			expect(await response.text()).toBe("Internal Server Error");
		});
	});
});
