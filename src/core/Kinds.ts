/**
 * Event kinds the hydration pipeline knows about.
 */

export const Kinds = {
  Metadata: 0,
  TextNote: 1,
  Picture: 20, // NIP-68
  Video: 21, // NIP-71
  ShortVideo: 22, // NIP-71
  Comment: 1111, // NIP-22
  ZapReceipt: 9735, // NIP-57
  Highlight: 9802, // NIP-84
  RelayList: 10002, // NIP-65
  CurationSet: 30004, // NIP-51
  LongForm: 30023, // NIP-23
  LongFormDraft: 30024, // NIP-23
  PublicationIndex: 30040,
  PublicationContent: 30041,
} as const

export type KnownKind = (typeof Kinds)[keyof typeof Kinds]

export const ARTICLE_KINDS: ReadonlySet<number> = new Set([Kinds.LongForm, Kinds.LongFormDraft])

export const MEDIA_KINDS: ReadonlySet<number> = new Set([Kinds.Picture, Kinds.Video, Kinds.ShortVideo])
