export function isSpaceKeyName(name: string): boolean {
  return name === 'SPACE' || name === ' ';
}

/** terminal-kit reports printable input as the character itself. */
export function isPrintableKeyName(name: string): boolean {
  return Array.from(name).length === 1 && !/[\u0000-\u001f\u007f]/.test(name);
}
