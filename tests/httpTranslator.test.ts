import axios, { AxiosError, AxiosHeaders } from "axios";
import { HttpTranslator } from "../src/services/httpTranslator";
import { ErrorStatus } from "../src/factory/status";

const translator = new HttpTranslator({ serviceUrl: "http://translator.test/", timeoutMs: 500 });

// Builds an axios error carrying an HTTP response with the given status.
function responseError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError("Request failed", "ERR_BAD_RESPONSE", config, undefined, {
    status,
    statusText: "",
    headers: {},
    config,
    data: {}
  });
}

describe("HTTP Translator Suite", () => {
  let post: jest.SpyInstance;

  beforeEach(() => {
    post = jest.spyOn(axios, "post");
  });

  afterEach(() => {
    post.mockRestore();
  });

  it("should post the text and return the translated text", async () => {
    post.mockResolvedValue({ data: { translatedText: "bonjour" } });

    await expect(translator.translate("hello", "en", "fr")).resolves.toBe("bonjour");
    expect(post).toHaveBeenCalledWith(
      "http://translator.test/translate",
      { text: "hello", sourceLang: "en", targetLang: "fr" },
      expect.objectContaining({ timeout: 500 })
    );
  });

  it("should fail on a response without translated text", async () => {
    post.mockResolvedValue({ data: { error: "model unavailable" } });

    await expect(translator.translate("hello", "en", "fr")).rejects.toMatchObject({
      errorType: ErrorStatus.translationFailedError,
      message: "model unavailable"
    });
  });

  it("should map a 422 from the service to an unsupported pair", async () => {
    post.mockRejectedValue(responseError(422));

    await expect(translator.translate("hello", "en", "xx")).rejects.toMatchObject({
      errorType: ErrorStatus.unsupportedLanguagePairError,
      message: "Unsupported language pair: en -> xx"
    });
  });

  it("should map a server error to a translation failure", async () => {
    post.mockRejectedValue(responseError(503));

    await expect(translator.translate("hello", "en", "fr")).rejects.toMatchObject({
      errorType: ErrorStatus.translationFailedError,
      message: "Translation service responded with status 503"
    });
  });

  it("should map a client-side timeout to a retryable timeout", async () => {
    post.mockRejectedValue(new AxiosError("timeout of 500ms exceeded", "ECONNABORTED"));

    await expect(translator.translate("hello", "en", "fr")).rejects.toMatchObject({
      errorType: ErrorStatus.translationTimeoutError,
      retryable: true
    });
  });

  it("should map an unreachable service to a translation failure", async () => {
    post.mockRejectedValue(new AxiosError("connect ECONNREFUSED", "ECONNREFUSED"));

    await expect(translator.translate("hello", "en", "fr")).rejects.toMatchObject({
      errorType: ErrorStatus.translationFailedError,
      message: "Translation service unreachable: connect ECONNREFUSED"
    });
  });
});
