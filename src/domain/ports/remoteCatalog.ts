export interface RemoteCatalog {
    /** File names available at `feedUrl`, newest first. Empty when the source is unreachable. */
    list(feedUrl: string): Promise<string[]>;
    /** Downloads `name` to `destination`; resolves to the destination, or null on failure. */
    fetch(
        feedUrl: string,
        name: string,
        destination: string,
    ): Promise<string | null>;
}
