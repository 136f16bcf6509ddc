const DEVICE_PATTERNS = ['usbmodem', 'usbserial', 'ttyusb', 'ttyacm'];

/** USB CDC and USB-serial adapters; the laser driver shows up as one of these */
export const isLaserDevicePath = (path: string): boolean => {
  const lower = path.toLowerCase();
  return DEVICE_PATTERNS.some(pattern => lower.includes(pattern));
};
