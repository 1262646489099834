import { GeistMono } from 'geist/font/mono';

export const geistMono = GeistMono;
