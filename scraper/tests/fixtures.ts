export const SENTENCE = "The river ran quietly past the old mill while the town slept. ";

// 496 characters, comfortably above the default minimum length.
export const PROSE = SENTENCE.repeat(8);

export function articlePage(title: string, body: string): string {
  return `<html><head><title>${title}</title></head><body><nav>Home</nav><main><p>${body}</p></main><footer>Contact</footer></body></html>`;
}
