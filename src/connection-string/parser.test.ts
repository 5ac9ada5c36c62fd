import { describe, expect, it } from "vitest";
import type { ValidationError } from "../lib/validation/index.js";
import type { Result } from "../shared/result.js";
import { formatConnectionString, parseConnectionString } from "./parser.js";
import type { ConnectionStringFields } from "./types.js";

const KEY = "dGVzdC1zZWNyZXQ=";
const SERVICE = `HostName=hub.example.com;SharedAccessKeyName=iothubowner;SharedAccessKey=${KEY}`;

function issuePaths(result: Result<ConnectionStringFields, ValidationError>): unknown[] {
	return result.ok ? [] : result.error.issues.map((i) => i.path);
}

describe("parseConnectionString", () => {
	describe("valid input", () => {
		it("parses a service connection string", () => {
			const result = parseConnectionString(SERVICE);

			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value).toEqual({
				hostName: "hub.example.com",
				iotHubName: "hub",
				sharedAccessKeyName: "iothubowner",
				sharedAccessKey: KEY,
			});
		});

		it("keeps base64 padding inside the key value", () => {
			const result = parseConnectionString(SERVICE);
			expect(result.ok && result.value.sharedAccessKey).toBe("dGVzdC1zZWNyZXQ=");
		});

		it("matches keys case-insensitively", () => {
			const result = parseConnectionString(
				`hostname=hub.example.com;sharedaccesskeyname=iothubowner;SHAREDACCESSKEY=${KEY}`,
			);
			expect(result.ok && result.value.sharedAccessKeyName).toBe("iothubowner");
		});

		it("skips empty segments and surrounding whitespace", () => {
			const result = parseConnectionString(` ${SERVICE} ;; `);
			expect(result.ok && result.value.hostName).toBe("hub.example.com");
		});

		it("treats an empty value as absent", () => {
			const result = parseConnectionString(`${SERVICE};DeviceId=`);
			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value.deviceId).toBeUndefined();
		});

		it("parses device, module and gateway scope", () => {
			const result = parseConnectionString(
				`HostName=hub.example.com;DeviceId=dev1;ModuleId=mod1;SharedAccessKey=${KEY};GatewayHostName=edge.local`,
			);
			expect(result.ok).toBe(true);
			if (!result.ok) return;
			expect(result.value).toEqual({
				hostName: "hub.example.com",
				iotHubName: "hub",
				sharedAccessKey: KEY,
				deviceId: "dev1",
				moduleId: "mod1",
				gatewayHostName: "edge.local",
			});
		});

		it("accepts a pre-issued signature without a key", () => {
			const signature = "SharedAccessSignature sr=hub.example.com&sig=abc&se=1700003600";
			const result = parseConnectionString(
				`HostName=hub.example.com;SharedAccessKeyName=iothubowner;SharedAccessSignature=${signature}`,
			);
			expect(result.ok && result.value.sharedAccessSignature).toBe(signature);
		});
	});

	describe("segment errors", () => {
		it("rejects unknown keys", () => {
			const result = parseConnectionString(`${SERVICE};Protocol=amqp`);
			expect(result.ok).toBe(false);
			expect(issuePaths(result)).toEqual([["Protocol"]]);
		});

		it("rejects duplicate keys", () => {
			const result = parseConnectionString(`${SERVICE};hostname=other.example.com`);
			expect(issuePaths(result)).toEqual([["HostName"]]);
		});

		it("rejects a segment without '='", () => {
			const result = parseConnectionString(`${SERVICE};dangling`);
			expect(issuePaths(result)).toEqual([[3]]);
			expect(result.ok ? "" : result.error.message).toBe(
				"Validation failed: Segment 3 is not a Key=Value pair",
			);
		});
	});

	describe("field errors", () => {
		it("requires HostName", () => {
			const result = parseConnectionString(`SharedAccessKeyName=iothubowner;SharedAccessKey=${KEY}`);
			expect(result.ok).toBe(false);
			if (result.ok) return;
			const issue = result.error.issues.find((i) => i.path[0] === "HostName");
			expect(issue?.message).toBe("HostName is required");
		});

		it("requires a fully qualified HostName", () => {
			const result = parseConnectionString(
				`HostName=hub;SharedAccessKeyName=iothubowner;SharedAccessKey=${KEY}`,
			);
			expect(issuePaths(result)).toContainEqual(["HostName"]);
		});

		it("requires a base64 SharedAccessKey", () => {
			const result = parseConnectionString(
				"HostName=hub.example.com;SharedAccessKeyName=iothubowner;SharedAccessKey=not base64!",
			);
			expect(issuePaths(result)).toContainEqual(["SharedAccessKey"]);
		});

		it("requires the SharedAccessSignature prefix", () => {
			const result = parseConnectionString(
				"HostName=hub.example.com;SharedAccessKeyName=iothubowner;SharedAccessSignature=sr=hub&sig=abc",
			);
			expect(issuePaths(result)).toContainEqual(["SharedAccessSignature"]);
		});

		it("requires a key or a signature", () => {
			const result = parseConnectionString("HostName=hub.example.com;SharedAccessKeyName=iothubowner");
			expect(result.ok).toBe(false);
			if (result.ok) return;
			expect(result.error.issues).toEqual([
				{
					path: ["SharedAccessKey"],
					message: "Either SharedAccessKey or SharedAccessSignature is required",
				},
			]);
		});

		it("requires SharedAccessKeyName with a hub-level key", () => {
			const result = parseConnectionString(`HostName=hub.example.com;SharedAccessKey=${KEY}`);
			expect(issuePaths(result)).toEqual([["SharedAccessKeyName"]]);
		});

		it("rejects ModuleId without DeviceId", () => {
			const result = parseConnectionString(`${SERVICE};ModuleId=mod1`);
			expect(issuePaths(result)).toEqual([["ModuleId"]]);
		});
	});
});

describe("formatConnectionString", () => {
	it("renders fields in canonical key order, omitting absent ones", () => {
		const text = formatConnectionString({
			gatewayHostName: "edge.local",
			deviceId: "dev1",
			sharedAccessKey: KEY,
			iotHubName: "hub",
			hostName: "hub.example.com",
		});
		expect(text).toBe(
			`HostName=hub.example.com;SharedAccessKey=${KEY};DeviceId=dev1;GatewayHostName=edge.local`,
		);
	});

	it("renders a parsed service connection string unchanged", () => {
		const result = parseConnectionString(SERVICE);
		expect(result.ok && formatConnectionString(result.value)).toBe(SERVICE);
	});
});
