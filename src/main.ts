// src/main.ts

import 'dotenv/config';
import { runMain } from './app';

void runMain();
