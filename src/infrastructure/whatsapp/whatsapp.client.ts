import axios, { type AxiosInstance, type AxiosResponse } from 'axios';

import { config } from '@config/env.config.js';
import { ConfigurationError } from '@core/errors/configuration.error.js';

let instance: AxiosInstance | null = null;

function createInstance(): AxiosInstance {
  const { WHATSAPP_PHONE_NUMBER_ID, WHATSAPP_ACCESS_TOKEN } = config;
  if (!WHATSAPP_PHONE_NUMBER_ID || !WHATSAPP_ACCESS_TOKEN) {
    throw new ConfigurationError('WhatsApp environment configuration is incomplete');
  }
  return axios.create({
    baseURL: `https://graph.facebook.com/v19.0/${WHATSAPP_PHONE_NUMBER_ID}`,
    headers: {
      Authorization: `Bearer ${WHATSAPP_ACCESS_TOKEN}`,
      'Content-Type': 'application/json',
    },
    timeout: 10000,
  });
}

function getAxios(): AxiosInstance {
  if (!instance) {
    instance = createInstance();
  }
  return instance;
}

export async function sendWhatsAppMessage(payload: object): Promise<AxiosResponse<unknown>> {
  return getAxios().post('/messages', payload);
}
