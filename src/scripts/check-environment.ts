import dotenv from 'dotenv';
import { checkEnvironment } from '../config/environment-check';

dotenv.config();

// Missing configuration is reported, never turned into a failing exit code
for (const line of checkEnvironment(process.env)) {
  console.log(line);
}
