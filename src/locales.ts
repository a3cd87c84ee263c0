export const TARGET_LOCALES = ["ar", "hi", "he"] as const;

export type TargetLocale = (typeof TARGET_LOCALES)[number];
export type Locale = "en" | TargetLocale;

type LocaleInfo = {
  language: string;
  /** Extra instruction appended to the translation system prompt. */
  scriptHint?: string;
  fallbackTitle: string;
  fallbackNote: string;
};

export const LOCALE_INFO: Record<TargetLocale, LocaleInfo> = {
  ar: {
    language: "Arabic",
    fallbackTitle: "ملخص مالي يومي",
    fallbackNote:
      "ملاحظة: الترجمة الآلية غير متاحة لهذا التقرير. يرجى الرجوع إلى النسخة الإنجليزية للحصول على معلومات دقيقة."
  },
  hi: {
    language: "Hindi",
    scriptHint: "Use Devanagari script.",
    fallbackTitle: "दैनिक वित्तीय सारांश",
    fallbackNote: "नोट: इस रिपोर्ट का मशीनी अनुवाद उपलब्ध नहीं है। सटीक जानकारी के लिए कृपया अंग्रेजी संस्करण देखें।"
  },
  he: {
    language: "Hebrew",
    fallbackTitle: "סיכום פיננסי יומי",
    fallbackNote: "הערה: תרגום אוטומטי אינו זמין לדוח זה. אנא עיינו בגרסה האנגלית למידע מדויק."
  }
};
