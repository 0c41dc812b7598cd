import "reflect-metadata";

process.env.PARAPHRASE_PROVIDER = "none";
process.env.CONTENT_OUTPUT_DIR = process.env.CONTENT_OUTPUT_DIR || "outputs";
