export const EXIT_OK = 0;
/** Configuration or fatal I/O error; nothing or only part of the run happened */
export const EXIT_FATAL = 1;
/** The run completed but some files or entries failed */
export const EXIT_PARTIAL_FAILURE = 2;
