const BANNER = `
  ┌─┐┌┐┌┌─┐┬ ┬ ┬┌┬┐┬┌─┐┌─┐
  ├─┤│││├─┤│ └┬┘ │ ││  └─┐
  ┴ ┴┘└┘┴ ┴┴─┘┴  ┴ ┴└─┘└─┘
`;

export function printBanner(version: string, write: (text: string) => void): void {
  write(`${BANNER}\n  v${version} · identity-aware analytics agent\n\n`);
}
