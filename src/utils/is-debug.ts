export function isDevOrTest(): boolean {
  const mode = process.env.NODE_ENV;

  return mode === 'development' || mode === 'test';
}
