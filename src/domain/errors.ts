export class ConversionError extends Error {
    inputPath: string;
    missing: string[];
    constructor(message: string, inputPath: string, missing: string[] = []) {
        super(message);
        this.name = "ConversionError";
        this.inputPath = inputPath;
        this.missing = missing;
    }
}

export class BundleExtractionError extends Error {
    bundlePath: string;
    constructor(message: string, bundlePath: string) {
        super(message);
        this.name = "BundleExtractionError";
        this.bundlePath = bundlePath;
    }
}
