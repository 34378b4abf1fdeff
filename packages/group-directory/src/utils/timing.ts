export function elapsedMilliseconds(startTime: Date | number): number {
  return Date.now() - new Date(startTime).getTime();
}

export function nowInEpochSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
