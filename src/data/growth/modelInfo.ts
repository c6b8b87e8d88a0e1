// Static copy for the Disclaimer and About tabs

export const GROWTH_FUNCTION = 'Linf × (1 − exp(−K × (age − t0)))'

export const ABOUT_PARAGRAPHS: string[] = [
  'This app predicts how much a dog will weigh as it grows, starting from its breed, sex, current age and current weight.',
  'Predictions come from a canine growth model fitted to publicly available weight records. The model uses the von Bertalanffy growth function, a sigmoidal curve that is widely used for biological growth:',
  'Linf is the asymptotic adult weight, K is the growth rate and t0 is the hypothetical age at which weight is zero. The three parameters are fitted in a Bayesian mixed-effects framework, so each breed, and each sex within a breed, gets its own variation around the population curve.',
  "The population curve for your dog's breed and sex is rescaled so it passes through your dog's current weight at its current age. The shaded band is the 95% prediction interval after that rescaling.",
]

export const DISCLAIMER_PARAGRAPHS: string[] = [
  'The growth model and this application are for informational and educational purposes only. The predictions are based on a dataset that may not represent the growth of every breed or every individual dog. Genetics, nutrition, health and environment all influence how a dog grows.',
  'Treat the predictions as general guidelines, not definitive outcomes. Ask a veterinary nutrition specialist for personalised advice and monitor your dog\'s growth regularly. No warranty is made about the completeness, accuracy, reliability or availability of the model, the application or the information it shows.',
  'By using this application you accept this disclaimer and the uncertainty inherent in its predictions. If you have concerns about your dog\'s growth or health, consult a qualified veterinary professional.',
]
