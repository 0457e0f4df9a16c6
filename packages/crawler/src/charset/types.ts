type CharsetOrder = 'codepoint' | 'declared';

type CharsetPreset = 'alphanumeric' | 'extended';

type CharsetTier = 'primary' | 'special';

export type { CharsetOrder, CharsetPreset, CharsetTier };
