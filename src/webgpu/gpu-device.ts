/// <reference types="@webgpu/types" />
/**
 * @file gpu-device.ts
 * @description Shared GPUDevice for hosts that run sub-graphs on real hardware.
 *
 * @pitfalls
 * - The caller supplies the `GPU` entry point (`navigator.gpu` in a browser, or a Node
 *   binding's `create()`); nothing here probes globals.
 * - A lost device is forgotten; the next call requests a new one.
 */

let device: GPUDevice | null = null;

export async function getSharedDevice(gpu: GPU): Promise<GPUDevice> {
  if (device) return device;

  const adapter = await gpu.requestAdapter();
  if (!adapter) throw new Error('No WebGPU Adapter found');
  const created = await adapter.requestDevice();
  device = created;

  // Handle lost device
  void created.lost.then(info => {
    console.error(`WebGPU Device lost: ${info.message}`);
    if (device === created) device = null;
  });

  return created;
}
