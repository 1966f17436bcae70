interface MediaRange {
    type: string;
    quality: number;
}

const parseMediaRange = (part: string): MediaRange => {
    const [type = '', ...parameters] = part.split(';').map(segment => segment.trim());
    const qualityParameter = parameters.find(parameter => parameter.toLowerCase().startsWith('q='));
    const quality = qualityParameter ? Number(qualityParameter.slice(2)) : 1;

    return {
        type: type.toLowerCase(),
        quality: Number.isFinite(quality) ? quality : 0,
    };
};

/**
 * True when the Accept header lists `mediaType` explicitly with a non-zero quality.
 * Wildcard ranges do not count.
 */
export const acceptsMediaType = (acceptHeader: string | undefined, mediaType: string): boolean => {
    if (!acceptHeader) return false;

    const wanted = mediaType.toLowerCase();
    return acceptHeader
        .split(',')
        .map(parseMediaRange)
        .some(range => range.type === wanted && range.quality > 0);
};
