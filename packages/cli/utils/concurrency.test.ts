import { describe, expect, it } from "vitest"
import { mapWithConcurrency } from "@/utils/concurrency"

describe("mapWithConcurrency", () => {
	it("keeps input order", async () => {
		const delays = [30, 5, 20, 1]
		const result = await mapWithConcurrency(delays, 2, async (delay, index) => {
			await new Promise((resolve) => setTimeout(resolve, delay))
			return index
		})

		expect(result).toEqual([0, 1, 2, 3])
	})

	it("never runs more than the limit at once", async () => {
		let active = 0
		let peak = 0
		await mapWithConcurrency([1, 2, 3, 4, 5, 6], 3, async () => {
			active += 1
			peak = Math.max(peak, active)
			await new Promise((resolve) => setTimeout(resolve, 5))
			active -= 1
		})

		expect(peak).toBe(3)
	})

	it("returns an empty list for no items", async () => {
		const result = await mapWithConcurrency([], 4, async () => 1)

		expect(result).toEqual([])
	})
})
