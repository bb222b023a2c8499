import type { SensorReading } from '../types/index.js';

// Chip name prefix -> component. First match wins, so longer prefixes go first.
const CHIP_IDENTITIES: ReadonlyArray<readonly [prefix: string, name: string]> = [
  ['coretemp', 'CPU'],
  ['k10temp', 'CPU'],
  ['zenpower', 'CPU'],
  ['amdgpu', 'GPU (AMD)'],
  ['radeon', 'GPU (AMD)'],
  ['nouveau', 'GPU (NVIDIA)'],
  ['nvidia-gpu', 'GPU (NVIDIA)'],
  ['nvidia', 'GPU (NVIDIA)'],
  ['intel_gpu', 'GPU (Intel)'],
  ['i915', 'GPU (Intel)'],
  ['nvme', 'NVMe SSD'],
  ['drivetemp', 'HDD/SSD'],
  ['smart-', 'HDD/SSD'],
  ['iwlwifi', 'WiFi'],
  ['ath', 'WiFi'],
  ['mt7', 'WiFi'],
  ['rtw', 'WiFi'],
  ['pch', 'PCH (Chipset)'],
  ['acpi', 'ACPI Thermal'],
  ['it87', 'Motherboard'],
  ['nct', 'Motherboard'],
  ['w83', 'Motherboard'],
  ['f71', 'Motherboard'],
  ['asus', 'Motherboard'],
  ['thinkpad', 'Laptop EC'],
  ['dell', 'Laptop EC'],
  ['hp', 'Laptop EC'],
  ['bat', 'Battery'],
];

/**
 * Human-readable component name for a chip id, e.g. `coretemp-isa-0000` -> `CPU`
 */
export function friendlyName(chip: string): string {
  const lower = chip.toLowerCase();
  for (const [prefix, name] of CHIP_IDENTITIES) {
    if (lower.startsWith(prefix)) return name;
  }
  return 'Sensor';
}

export function sensorKey(chip: string, label: string): string {
  return `${chip}/${label}`;
}

export function readingKey(reading: Pick<SensorReading, 'chip' | 'label'>): string {
  return sensorKey(reading.chip, reading.label);
}

/**
 * Split a key at its first slash. Labels may themselves contain slashes.
 */
export function splitSensorKey(key: string): { chip: string; label: string } {
  const idx = key.indexOf('/');
  if (idx === -1) return { chip: key, label: key };
  return { chip: key.slice(0, idx), label: key.slice(idx + 1) };
}
