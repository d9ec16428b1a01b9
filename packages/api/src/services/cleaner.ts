/**
 * Source Cleaner
 *
 * Light cleanup ahead of the chunker. Runs of spaces and tabs become one
 * space, line breaks are normalized and kept, and a Project Gutenberg
 * licence trailer is cut off along with everything after it.
 */

// "End of Project Gutenberg's ...", "End of the Project Gutenberg EBook ...",
// "*** END OF THE PROJECT GUTENBERG EBOOK ..."
const GUTENBERG_TRAILER = /^.*\bEnd of (?:the )?Project Gutenberg/im;

export function cutGutenbergTrailer(text: string): string {
  const match = GUTENBERG_TRAILER.exec(text);
  return match ? text.slice(0, match.index) : text;
}

export function cleanSource(text: string): string {
  const normalized = text.replace(/\r\n?/g, '\n').replace(/[ \t]+/g, ' ');
  return cutGutenbergTrailer(normalized).trim();
}
