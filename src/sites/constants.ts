/**
 * Selector and meta-tag lists behind the generic rule set.
 * Order matters: earlier entries win.
 */

export const TITLE_META_STRONG = ['tweetmeme-title', 'dc.title', 'rbtitle', 'headline', 'title'];

export const TITLE_META_WEAK = ['og:title'];

export const TITLE_SELECTORS_STRONG = [
  '.hentry .entry-title',
  'h1#articleHeader',
  'h1.articleHeader',
  'h1.article',
  '.instapaper_title',
  '#meebo-title',
];

export const TITLE_SELECTORS_WEAK = [
  'article h1',
  '#entry-title',
  '.entry-title',
  '#entryTitle',
  '#entrytitle',
  '.entryTitle',
  '.entrytitle',
  '#articleTitle',
  '.articleTitle',
  'h1.title',
  'h2.article',
  'h1',
  'title',
];

export const AUTHOR_META_TAGS = [
  'byl',
  'clmst',
  'dc.author',
  'dcsext.author',
  'dc.creator',
  'rbauthors',
  'authors',
];

export const AUTHOR_MAX_LENGTH = 300;

export const AUTHOR_SELECTORS = [
  '.entry .entry-author',
  '.author.vcard .fn',
  '.author .vcard .fn',
  '.byline.vcard .fn',
  '.byline .vcard .fn',
  '.byline .by .author',
  '.byline .by',
  '.byline .author',
  '.post-author.vcard',
  '.post-author .vcard',
  'a[rel=author]',
  '#by_author',
  '.by_author',
  '#entryAuthor',
  '.entryAuthor',
  '.byline a[href*=author]',
  '#author .authorname',
  '.author .authorname',
  '#author',
  '.author',
  '.articleauthor',
  '.ArticleAuthor',
];

export const BYLINE_SELECTORS = ['#byline', '.byline'];
export const BYLINE_PATTERN = /^[\n\s]*By/i;

export const DATE_PUBLISHED_META_TAGS = [
  'article:published_time',
  'displaydate',
  'dc.date',
  'dc.date.issued',
  'rbpubdate',
  'publish_date',
  'pub_date',
  'pagedate',
  'pubdate',
  'revision_date',
  'doc_date',
  'date_created',
  'content_create_date',
  'lastmodified',
  'created',
  'date',
];

export const DATE_PUBLISHED_SELECTORS = [
  '.hentry .dtstamp.published',
  '.hentry .published',
  '.hentry .dtstamp.updated',
  '.hentry .updated',
  '.single .published',
  '.meta .published',
  '.meta .postDate',
  '.entry-date',
  '.byline .date',
  '.postmetadata .date',
  '.article_datetime',
  '.date-header',
  '.story-date',
  '.dateStamp',
  '#story .datetime',
  '.dateline',
  '.pubdate',
];

export const LEAD_IMAGE_META_TAGS = ['og:image', 'twitter:image', 'image_src'];

export const EXCERPT_META_TAGS = ['og:description', 'twitter:description', 'description'];
