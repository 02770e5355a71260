import * as dotenv from "dotenv";

dotenv.config();
