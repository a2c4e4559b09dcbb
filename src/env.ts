/**
 * Loads `.env` into `process.env`.
 *
 * Imported first by the CLI so AWS credentials and region from `.env` are
 * visible to the S3 client's default provider chain. `quiet` keeps dotenv
 * v17 from printing its injection notice.
 */
import dotenv from "dotenv";

dotenv.config({ quiet: true });
