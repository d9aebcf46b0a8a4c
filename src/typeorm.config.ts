import { DataSource } from 'typeorm';
import { config } from 'dotenv';
import { postgresOptions } from './database/database.options';

config();

export default new DataSource(postgresOptions((key) => process.env[key]));
