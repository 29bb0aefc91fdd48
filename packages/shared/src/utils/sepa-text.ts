const TRANSLITERATIONS: Record<string, string> = {
  ä: 'ae', æ: 'ae', Ä: 'AE', Æ: 'AE',
  ö: 'oe', ø: 'oe', œ: 'oe', Ö: 'OE', Ø: 'OE', Œ: 'OE',
  ü: 'ue', Ü: 'UE',
  ß: 'ss', ẞ: 'SS',
  à: 'a', á: 'a', â: 'a', ã: 'a', å: 'a', À: 'A', Á: 'A', Â: 'A', Ã: 'A', Å: 'A',
  ç: 'c', Ç: 'C',
  è: 'e', é: 'e', ê: 'e', ë: 'e', È: 'E', É: 'E', Ê: 'E', Ë: 'E',
  ì: 'i', í: 'i', î: 'i', ï: 'i', Ì: 'I', Í: 'I', Î: 'I', Ï: 'I',
  ñ: 'n', Ñ: 'N',
  ò: 'o', ó: 'o', ô: 'o', õ: 'o', Ò: 'O', Ó: 'O', Ô: 'O', Õ: 'O',
  ù: 'u', ú: 'u', û: 'u', Ù: 'U', Ú: 'U', Û: 'U',
  ý: 'y', ÿ: 'y', Ý: 'Y',
};

const SEPA_ALLOWED = /^[A-Za-z0-9 /\-?:().,+]$/;

/**
 * Reduce free text to the SEPA Latin character set. Known accented letters
 * are transliterated, every other disallowed character becomes a space.
 */
export function toSepaText(value: string, maxLength?: number): string {
  let out = '';
  for (const ch of value) {
    const replacement = TRANSLITERATIONS[ch];
    if (replacement !== undefined) {
      out += replacement;
    } else {
      out += SEPA_ALLOWED.test(ch) ? ch : ' ';
    }
  }
  return maxLength === undefined ? out : out.slice(0, maxLength);
}
