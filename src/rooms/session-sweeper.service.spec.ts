import { Test } from "@nestjs/testing";
import { ConfigService } from "@nestjs/config";
import { SessionSweeper } from "./session-sweeper.service";
import { RoomOccupancyService } from "./room-occupancy.service";

describe("SessionSweeper", () => {
	let sweeper: SessionSweeper;

	const mockOccupancy = {
		sweepIdleSessions: jest.fn(),
	};

	beforeEach(async () => {
		mockOccupancy.sweepIdleSessions.mockReset();
		const moduleRef = await Test.createTestingModule({
			providers: [SessionSweeper],
		})
			.useMocker((token) => {
				if (token === RoomOccupancyService) {
					return mockOccupancy;
				}
				if (token === ConfigService) {
					return { get: jest.fn(() => undefined) };
				}
			})
			.compile();

		sweeper = moduleRef.get(SessionSweeper);
	});

	it("runs one sweep per tick", async () => {
		mockOccupancy.sweepIdleSessions.mockResolvedValue({
			markedOffline: 0,
			evicted: 0,
		});
		await sweeper.tick();
		await sweeper.tick();
		expect(mockOccupancy.sweepIdleSessions).toHaveBeenCalledTimes(2);
	});

	it("skips a tick while the previous sweep is still running", async () => {
		let finish: () => void = () => undefined;
		mockOccupancy.sweepIdleSessions.mockReturnValueOnce(
			new Promise<void>((resolve) => {
				finish = resolve;
			}),
		);
		const first = sweeper.tick();
		await sweeper.tick();
		finish();
		await first;
		expect(mockOccupancy.sweepIdleSessions).toHaveBeenCalledTimes(1);
	});

	it("logs a failed sweep and keeps going", async () => {
		mockOccupancy.sweepIdleSessions.mockRejectedValueOnce(new Error("db down"));
		await expect(sweeper.tick()).resolves.toBeUndefined();
	});
});
