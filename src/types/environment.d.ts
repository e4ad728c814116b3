declare global {
    namespace NodeJS {
      interface ProcessEnv {
        VECTOR_EPSILON?: string;
        LOG_LEVEL?: string;
        LOG_FILE?: string;
      }
    }
  }

  export {};
