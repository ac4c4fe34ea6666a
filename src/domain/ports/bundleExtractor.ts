export interface BundleExtractor {
    extract(bundlePath: string, destinationDir: string): Promise<string[]>;
}
