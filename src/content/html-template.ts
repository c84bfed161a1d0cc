// Post HTML template
// Full standalone document with SEO meta, Open Graph, Twitter and JSON-LD

import { POST_STYLES } from './post-styles';

export interface PostDocumentInput {
  title: string;
  /** Already attribute-escaped */
  description: string;
  keywords: string;
  category: string;
  bodyHtml: string;
  featuredImageSrc: string | null;
  primarySourceUrl: string;
  publishedDate: string;
  blogName: string;
  author: string;
}

export function escapeTitle(title: string): string {
  return title
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function capitalize(value: string): string {
  return value ? value.charAt(0).toUpperCase() + value.slice(1).toLowerCase() : value;
}

function buildStructuredData(input: PostDocumentInput): string {
  const data = {
    '@context': 'https://schema.org',
    '@type': 'NewsArticle',
    headline: input.title,
    image: [],
    datePublished: `${input.publishedDate}T00:00:00Z`,
    dateModified: `${input.publishedDate}T00:00:00Z`,
    articleSection: capitalize(input.category),
    author: { '@type': 'Organization', name: input.author },
    publisher: {
      '@type': 'Organization',
      name: input.blogName,
      logo: { '@type': 'ImageObject', url: '' },
    },
    mainEntityOfPage: { '@type': 'WebPage', '@id': input.primarySourceUrl },
    description: input.description,
  };
  // `</` inside a string would close the script element early
  return JSON.stringify(data, null, 2).replace(/<\//g, '<\\/');
}

export function renderPostDocument(input: PostDocumentInput): string {
  const escapedTitle = escapeTitle(input.title);
  const sourceUrl = escapeTitle(input.primarySourceUrl);
  const featuredImage = input.featuredImageSrc
    ? `<img src="${input.featuredImageSrc}" alt="${escapedTitle}" class="featured-image">`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapedTitle}</title>
    <meta name="description" content="${input.description}">
    <meta name="keywords" content="${escapeTitle(input.keywords)}">
    <meta name="robots" content="index, follow">
    <meta name="author" content="${escapeTitle(input.author)}">

    <meta property="og:type" content="article">
    <meta property="og:url" content="${sourceUrl}">
    <meta property="og:title" content="${escapedTitle}">
    <meta property="og:description" content="${input.description}">
    <meta property="og:image" content="">

    <meta property="twitter:card" content="summary_large_image">
    <meta property="twitter:url" content="${sourceUrl}">
    <meta property="twitter:title" content="${escapedTitle}">
    <meta property="twitter:description" content="${input.description}">
    <meta property="twitter:image" content="">

    <script type="application/ld+json">
${buildStructuredData(input)}
    </script>
    <style>
${POST_STYLES}
    </style>
</head>
<body>
    <div class="container">
        <div class="article-header">
            <span class="category-tag">${input.category.toUpperCase()}</span>
            <h1>${escapedTitle}</h1>
            ${featuredImage}
        </div>
        <div class="article-content">
${input.bodyHtml}
        </div>
        <div class="source-link">
            <p><strong>Disclaimer:</strong> This article was generated by an AI content creation system, synthesizing information from multiple sources. It may contain fictional details and external links for illustrative purposes.</p>
            <p>A primary source contributing to this content can be found here: <a href="${sourceUrl}" target="_blank" rel="noopener noreferrer">${sourceUrl}</a></p>
        </div>
    </div>
</body>
</html>`;
}
