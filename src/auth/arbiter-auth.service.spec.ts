import { Test } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { ArbiterAuthService } from "./arbiter-auth.service";

const settings: Record<string, string | undefined> = {
	ARBITER_USER: "arbiter",
	ARBITER_PASS: "test-secret",
	ARBITER_NAME: "Test Arbiter",
};

describe("ArbiterAuthService", () => {
	let service: ArbiterAuthService;

	const mockConfigService = {
		get: jest.fn((key: string) => settings[key]),
	};

	beforeEach(async () => {
		const moduleRef = await Test.createTestingModule({
			providers: [ArbiterAuthService],
		})
			.useMocker((token) => {
				if (token === ConfigService) {
					return mockConfigService;
				}
			})
			.compile();

		service = moduleRef.get(ArbiterAuthService);
	});

	it("accepts the configured credentials", () => {
		expect(service.authenticate("arbiter", "test-secret")).toEqual({
			id: "arbiter",
			name: "Test Arbiter",
		});
	});

	it("rejects wrong credentials", () => {
		expect(service.authenticate("arbiter", "wrong")).toBeUndefined();
		expect(service.authenticate("someone", "test-secret")).toBeUndefined();
		expect(service.authenticate("", "")).toBeUndefined();
	});

	it("authorizes only the configured arbiter", () => {
		expect(service.isAuthorized({ id: "arbiter", name: "Anyone" })).toBe(true);
		expect(service.isAuthorized({ id: "intruder", name: "Test Arbiter" })).toBe(
			false,
		);
	});

	it("refuses to start without a password", async () => {
		const withoutPassword = Test.createTestingModule({
			providers: [ArbiterAuthService],
		})
			.useMocker((token) => {
				if (token === ConfigService) {
					return {
						get: (key: string) =>
							key === "ARBITER_PASS" ? undefined : settings[key],
					};
				}
			})
			.compile();
		await expect(withoutPassword).rejects.toThrow("ARBITER_PASS is not set");
	});
});
