import { describe, it, expect, vi } from "vitest";
import { createScanProgress, noopProgress } from "./progress.js";

describe("Scan Progress", () => {
  it("should render the initial frame on creation", () => {
    const write = vi.fn();
    createScanProgress({ total: 4, write });

    expect(write).toHaveBeenCalledWith("\rScanning regions 0/4 (0%)  ");
  });

  it("should advance on tick", () => {
    const write = vi.fn();
    const progress = createScanProgress({ total: 4, write });

    progress.tick();
    progress.tick(2);

    expect(write).toHaveBeenLastCalledWith("\rScanning regions 3/4 (75%)  ");
  });

  it("should not go past the total", () => {
    const write = vi.fn();
    const progress = createScanProgress({ total: 2, write });

    progress.tick(5);

    expect(write).toHaveBeenLastCalledWith("\rScanning regions 2/2 (100%)  ");
  });

  it("should use the new label", () => {
    const write = vi.fn();
    const progress = createScanProgress({ total: 1, write });

    progress.setLabel("Regions");

    expect(write).toHaveBeenLastCalledWith("\rRegions 0/1 (0%)  ");
  });

  it("should clear the line once on done", () => {
    const write = vi.fn();
    const progress = createScanProgress({ total: 1, write });

    progress.done();
    progress.done();
    progress.tick();

    // "Scanning regions 0/1 (0%)" is 25 characters
    expect(write).toHaveBeenCalledTimes(2);
    expect(write).toHaveBeenLastCalledWith("\r" + " ".repeat(27) + "\r");
  });

  it("should return the noop reporter when disabled", () => {
    expect(createScanProgress({ total: 3, enabled: false })).toBe(noopProgress);
    expect(createScanProgress({ total: 0 })).toBe(noopProgress);
  });
});
